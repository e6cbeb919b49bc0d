import { estimateImageCost } from '@/shared/constants/image-generation';
import type { StoryOutcome } from '@/shared/types/stories';

export type RunSummary = {
  selected: number;
  successCount: number;
  failCount: number;
  skippedCount: number;
  generatedCount: number;
  estimatedCost: number;
  elapsedMs: number;
  imagesDir: string;
};

export class RunTally {
  successCount = 0;
  failCount = 0;
  skippedCount = 0;
  generatedCount = 0;
  private readonly startedAt = Date.now();

  record(outcome: StoryOutcome) {
    if (outcome.status === 'failed') {
      this.failCount += 1;
      return;
    }
    this.successCount += 1;
    if (outcome.status === 'complete') this.skippedCount += 1;
    if (outcome.status === 'uploaded' && outcome.generated) this.generatedCount += 1;
  }

  snapshot(selected: number, imagesDir: string): RunSummary {
    return {
      selected,
      successCount: this.successCount,
      failCount: this.failCount,
      skippedCount: this.skippedCount,
      generatedCount: this.generatedCount,
      estimatedCost: estimateImageCost(this.successCount),
      elapsedMs: Date.now() - this.startedAt,
      imagesDir,
    };
  }
}

export function formatCost(amount: number) {
  return `$${amount.toFixed(2)}`;
}

export function formatRunSummary(summary: RunSummary) {
  const rule = '='.repeat(60);
  return [
    rule,
    'SUMMARY',
    rule,
    `Successfully processed: ${summary.successCount}`,
    `Failed: ${summary.failCount}`,
    `Already complete: ${summary.skippedCount}`,
    `Estimated cost: ${formatCost(summary.estimatedCost)}`,
    `Images saved in: ${summary.imagesDir}`,
    rule,
  ];
}
