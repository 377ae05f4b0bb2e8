import { ActionResult } from './memory.types';

/**
 * Folds actions that fall out of the recent-action window into milestone
 * strings.
 */
export class Summarizer {
  constructor(readonly windowSize: number = 5) {}

  shouldSummarize(actions: ActionResult[]): boolean {
    return actions.length > this.windowSize;
  }

  /**
   * Splits `actions` into milestones for everything older than the window
   * and the actions that stay in detail.
   */
  summarize(actions: ActionResult[]): {
    milestones: string[];
    remaining: ActionResult[];
  } {
    if (!this.shouldSummarize(actions)) {
      return { milestones: [], remaining: actions };
    }

    const cut = actions.length - this.windowSize;
    return {
      milestones: this.groupIntoMilestones(actions.slice(0, cut)),
      remaining: actions.slice(cut),
    };
  }

  summarizeForPhaseChange(oldPhase: string, actions: ActionResult[]): string {
    if (!oldPhase) {
      return '';
    }

    const succeeded = actions.filter((action) => action.success).length;
    if (succeeded === 0) {
      return `Attempted ${oldPhase} phase`;
    }
    return `Completed ${oldPhase} phase (${succeeded} actions)`;
  }

  private groupIntoMilestones(actions: ActionResult[]): string[] {
    const milestones: string[] = [];
    let group: ActionResult[] = [];

    const flush = () => {
      if (group.length > 0) {
        milestones.push(this.summarizeGroup(group));
        group = [];
      }
    };

    for (const action of actions) {
      if (!action.success) {
        flush();
        milestones.push(`Attempted ${action.action} (failed)`);
        continue;
      }
      if (group.length > 0 && group[0].action !== action.action) {
        flush();
      }
      group.push(action);
    }
    flush();

    return milestones;
  }

  private summarizeGroup(group: ActionResult[]): string {
    const last = group[group.length - 1];
    if (group.length === 1) {
      return last.result ? `${last.action}: ${last.result}` : last.action;
    }

    const label = `Completed ${group.length} ${last.action} actions`;
    return last.result ? `${label} (${last.result})` : label;
  }
}
