import type { StoryRecord, StoryRunMode } from '@/shared/types/stories';

function range(start: number, end: number) {
  const out: number[] = [];
  for (let i = start; i < end; i += 1) out.push(i);
  return out;
}

export function selectStoryIndices(mode: StoryRunMode, stories: readonly StoryRecord[]): number[] {
  switch (mode.kind) {
    case 'test':
      return stories.length > 0 ? [0] : [];
    case 'level':
      return stories.flatMap((story, index) => (story.difficultyLevel === mode.level ? [index] : []));
    case 'all':
      return range(0, stories.length);
    case 'window': {
      const end = Math.min(mode.start + mode.count, stories.length);
      return range(mode.start, end);
    }
  }
}

export function describeRunMode(mode: StoryRunMode, selected: readonly number[]) {
  switch (mode.kind) {
    case 'test':
      return 'TEST MODE: processing only the first story';
    case 'level':
      return `Processing level ${mode.level}: ${selected.length} stories`;
    case 'all':
      return `Processing ALL ${selected.length} stories`;
    case 'window': {
      if (selected.length === 0) return `Nothing to process from index ${mode.start}`;
      return `Processing stories ${selected[0]} to ${selected[selected.length - 1]} (${selected.length} stories)`;
    }
  }
}
