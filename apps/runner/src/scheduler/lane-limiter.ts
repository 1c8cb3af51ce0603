import PQueue from "p-queue";
import type { StageLane } from "@trackpress/core";
import type { LaneLimits } from "./lane-policy";

export interface LaneStats {
  running: number;
  waiting: number;
}

// One queue per resource lane; a stage attempt holds a slot only while its collaborator runs.
export class LaneLimiter {
  private readonly queues: Record<StageLane, PQueue>;

  constructor(limits: LaneLimits) {
    this.queues = {
      network: new PQueue({ concurrency: limits.network }),
      transcode: new PQueue({ concurrency: limits.transcode }),
      light: new PQueue({ concurrency: limits.light }),
    };
  }

  run<T>(lane: StageLane, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.queues[lane].add(() => task(), { signal, throwOnTimeout: true });
  }

  stats(lane: StageLane): LaneStats {
    const queue = this.queues[lane];
    return { running: queue.pending, waiting: queue.size };
  }
}
