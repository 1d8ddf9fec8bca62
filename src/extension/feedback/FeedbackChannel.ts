/**
 * FeedbackChannel - bounded, latest-wins inbox for behaviour feedback
 *
 * The behaviour collaborator pushes samples at its own pace; the runner polls
 * once per tick and only the newest sample counts. Samples are validated on
 * the way in so the orchestrator only ever sees well-formed StressMetrics.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../../core/logger.js';
import { STRESS_LEVELS, type StressLevel, type StressMetrics } from '../../core/types.js';

const unit = z.number().min(-1).max(1);

export const stressMetricsSchema = z.object({
  stressLevel: z.enum(STRESS_LEVELS),
  movementRate: z.number().min(0).max(1),
  heartRate: z.number().positive().optional(),
  subjectLocation: z.object({ x: unit, y: unit, z: unit }).optional(),
});

/** Map a normalised stress score in [0, 1] to a level. */
export function classifyStressLevel(score: number): StressLevel {
  if (score > 0.7) return 'high';
  if (score > 0.3) return 'moderate';
  return 'low';
}

export class FeedbackChannel {
  private readonly queue: StressMetrics[] = [];
  private droppedCount = 0;
  private readonly log: Logger;

  constructor(
    private readonly capacity = 8,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('feedback');
  }

  /** Validate and enqueue. Returns false when the sample was rejected. */
  push(sample: unknown): boolean {
    const parsed = stressMetricsSchema.safeParse(sample);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues }, 'rejected feedback sample');
      return false;
    }

    this.queue.push(parsed.data);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
    return true;
  }

  /** Newest sample, discarding everything older. Undefined when empty. */
  poll(): StressMetrics | undefined {
    const latest = this.queue.pop();
    this.droppedCount += this.queue.length;
    this.queue.length = 0;
    return latest;
  }

  peek(): StressMetrics | undefined {
    return this.queue[this.queue.length - 1];
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Samples evicted on overflow or superseded by a newer one. */
  get dropped(): number {
    return this.droppedCount;
  }
}
