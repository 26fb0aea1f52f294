// cli/format.ts — Human-readable lines for ticks, events and summaries

import type { CombatEvent, CombatantView, TickResult } from '../src/types/index.js';
import type { ScenarioSummary } from '../src/server/scenario.js';

export function formatEvent(event: CombatEvent): string {
  switch (event.type) {
    case 'skill_charging_begun':
      return `${event.combatantId} ${event.mode === 'aim' ? 'aims' : 'charges'} ${event.skill}`;
    case 'skill_charged':
      return `${event.combatantId} ${event.skill} charged`;
    case 'skill_activated':
      return event.whiff
        ? `${event.combatantId} ${event.skill} whiffs`
        : `${event.combatantId} ${event.skill} → ${event.targetIds.join(', ') || '(defense up)'}`;
    case 'skill_state_changed':
      return `${event.combatantId} ${event.from} → ${event.to}`;
    case 'skill_cancelled':
      return `${event.combatantId} ${event.skill} cancelled (${event.reason}${event.refunded > 0 ? `, refunded ${event.refunded}` : ''})`;
    case 'skill_completed':
      return `${event.combatantId} ${event.skill ?? 'skill'} completed`;
    case 'defense_exhausted':
      return `${event.combatantId} ${event.skill} dropped: out of stamina`;
    case 'defense_expired':
      return `${event.combatantId} ${event.skill} dropped: held too long`;
    case 'interaction_resolved': {
      const o = event.outcome;
      const damage = [
        o.defender.damage > 0 ? `${o.defenderId} -${o.defender.damage}` : '',
        o.attacker.damage > 0 ? `${o.attackerId} -${o.attacker.damage}` : '',
      ].filter(Boolean).join(', ');
      return `#${o.seq} ${o.attackerId} ${o.offense} vs ${o.defenderId}${o.defense ? ` ${o.defense}` : ''}: ${o.kind}${damage ? ` (${damage})` : ''}`;
    }
    case 'status_threshold_crossed':
      return `${event.combatantId} CC meter crossed ${event.threshold}`;
    case 'status_applied':
      return `${event.combatantId} ${event.status} ${event.durationMs}ms`;
    case 'status_expired':
      return `${event.combatantId} ${event.status} wore off`;
    case 'resting_changed':
      return `${event.combatantId} ${event.resting ? 'rests' : 'stands'}`;
    case 'telegraph_started':
      return `${event.combatantId} telegraphs "${event.cue}" (${event.skill} in ${event.leadMs}ms)`;
    case 'telegraph_cancelled':
      return `${event.combatantId} telegraph "${event.cue}" cancelled`;
    case 'pattern_node_entered':
      return `${event.combatantId} [${event.pattern}] ${event.from ?? '∅'} → ${event.node} (${event.reason})`;
    case 'combatant_defeated':
      return `${event.combatantId} defeated${event.defeatedBy ? ` by ${event.defeatedBy}` : ''}`;
    case 'target_lost':
      return `${event.combatantId} lost target ${event.targetId ?? '(none)'}`;
    case 'invariant_violation':
      return `${event.combatantId} INVARIANT VIOLATION: ${event.message}`;
  }
}

export function formatTickLine(result: TickResult): string {
  const head = `[t${result.tick} ${result.timeMs}ms]`;
  return result.events.map((event) => `${head} ${formatEvent(event)}`).join('\n');
}

function formatCombatant(view: CombatantView): string {
  const state = view.skill ? `${view.state}:${view.skill}` : view.state;
  return `  ${view.id.padEnd(12)} ${view.team.padEnd(8)} hp ${view.health}/${view.maxHealth}  st ${view.stamina}/${view.maxStamina}  cc ${Math.round(view.ccMeter)}  ${state}  ${view.condition}`;
}

export function formatSummary(summary: ScenarioSummary): string {
  const outcome = summary.winner ? `winner: ${summary.winner}` : 'undecided';
  return [
    `${summary.name}: ${outcome} after ${summary.ticks} ticks (${summary.timeMs}ms), ${summary.interactions} interactions`,
    ...summary.combatants.map(formatCombatant),
  ].join('\n');
}
