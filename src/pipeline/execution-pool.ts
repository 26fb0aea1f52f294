// pipeline/execution-pool.ts — Recycles SkillExecution records between ticks

import type { SkillExecution } from '../types/index.js';
import type { ExecutionInit } from '../skills/context.js';

export class ExecutionPool {
  private free: SkillExecution[] = [];
  private nextId = 1;
  private live = 0;

  acquire(init: ExecutionInit): SkillExecution {
    const execution = this.free.pop() ?? {
      id: 0,
      combatantId: '',
      skill: 'light_attack',
      targetIds: [],
      chargeStartedAt: 0,
      activatedAt: 0,
      tick: 0,
      speed: 0,
      hit: true,
    };

    execution.id = this.nextId++;
    execution.combatantId = init.combatantId;
    execution.skill = init.skill;
    execution.targetIds.length = 0;
    execution.targetIds.push(...init.targetIds);
    execution.chargeStartedAt = init.chargeStartedAt;
    execution.activatedAt = init.activatedAt;
    execution.tick = init.tick;
    execution.speed = init.speed;
    execution.hit = init.hit;

    this.live++;
    return execution;
  }

  release(execution: SkillExecution): void {
    execution.targetIds.length = 0;
    this.free.push(execution);
    this.live--;
  }

  get inUse(): number {
    return this.live;
  }

  get available(): number {
    return this.free.length;
  }
}
