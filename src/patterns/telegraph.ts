// patterns/telegraph.ts — Pending telegraph: the cue is out, the request waits for the lead

import type { Millis, SkillKind, TelegraphSpec } from '../types/index.js';

export class TelegraphTimer {
  constructor(
    readonly spec: TelegraphSpec,
    readonly skill: SkillKind,
    readonly startedAt: Millis,
  ) {}

  get cue(): string {
    return this.spec.cue;
  }

  /** When the deferred request may be issued. */
  get dueAt(): Millis {
    return this.startedAt + this.spec.leadMs;
  }

  isDue(now: Millis): boolean {
    return now >= this.dueAt;
  }
}
