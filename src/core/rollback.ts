import type { Logger } from "../lib/logger.js";

export interface RollbackPlan {
  mainBranch: string;
  /** Main line HEAD before the run touched anything. */
  startSha: string;
  rcTag: string;
  stagingBranch: string;
}

export function rollbackCommands(plan: RollbackPlan): string[] {
  return [
    `git checkout ${plan.mainBranch}`,
    `git reset --hard ${plan.startSha}`,
    `git tag -d ${plan.rcTag}`,
    `git branch -D ${plan.stagingBranch}`,
  ];
}

/**
 * Advisory only: while armed, a failure of the guarded work prints the
 * commands that undo the local mutations. Nothing is reverted automatically.
 */
export class RollbackAdvisor {
  private armed = true;
  private remoteTouched = false;

  constructor(
    private readonly plan: RollbackPlan,
    private readonly logger: Logger,
  ) {}

  get isArmed(): boolean {
    return this.armed;
  }

  /** Remote state (distribution store, pushed refs) may now need manual cleanup too. */
  markRemoteMutation(): void {
    this.remoteTouched = true;
  }

  disarm(): void {
    this.armed = false;
  }

  render(): string[] {
    const lines = [
      `The release of ${this.plan.rcTag} failed after the repository was modified.`,
      `The main line may already carry the changelog and next-version commits.`,
      "To restore the local clone, run:",
      ...rollbackCommands(this.plan).map((cmd) => `  ${cmd}`),
    ];
    if (this.remoteTouched) {
      lines.push(
        "Publishing had started: remove the distribution directory and any pushed tag or ref by hand.",
      );
    }
    return lines;
  }

  advise(): void {
    if (!this.armed) return;
    this.logger.fail(this.render().join("\n"));
  }
}

/**
 * Runs `work` with an armed advisor; on failure the advice is printed and the
 * error rethrown, on success the advisor is disarmed before returning.
 */
export async function withRollbackAdvice<T>(
  plan: RollbackPlan,
  logger: Logger,
  work: (advisor: RollbackAdvisor) => Promise<T>,
): Promise<T> {
  const advisor = new RollbackAdvisor(plan, logger);
  try {
    const result = await work(advisor);
    advisor.disarm();
    return result;
  } catch (err) {
    advisor.advise();
    throw err;
  }
}
