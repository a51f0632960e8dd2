import { errorMessage } from "../utils.js";
import type { CandidateRanking, FileTree, SelectionMode } from "../../types.js";
import { RuleBasedStrategy } from "./ruleBased.js";
import type { SelectionContext, SelectionStrategy } from "./types.js";

export type StrategyName = "vector" | "ai" | "rules";

export const MODE_CHAINS: Record<SelectionMode, readonly StrategyName[]> = {
  vector: ["vector", "rules"],
  ai: ["ai", "rules"],
  auto: ["vector", "ai", "rules"],
  rules: ["rules"]
};

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export interface SelectionOutcome {
  strategy: string;
  ranking: CandidateRanking;
  failures: readonly StrategyFailure[];
}

/**
 * Ordered fallback over strategies. The rule-based strategy always terminates
 * the chain, so select() cannot fail.
 */
export class SelectionChain {
  private readonly strategies: readonly SelectionStrategy[];
  private readonly terminal: SelectionStrategy;

  constructor(strategies: readonly SelectionStrategy[]) {
    const last = strategies[strategies.length - 1];
    this.terminal = last instanceof RuleBasedStrategy ? last : new RuleBasedStrategy();
    this.strategies = strategies.filter((s) => !(s instanceof RuleBasedStrategy));
  }

  get names(): string[] {
    return [...this.strategies.map((s) => s.name), this.terminal.name];
  }

  async select(fileTree: FileTree, context: SelectionContext): Promise<SelectionOutcome> {
    const failures: StrategyFailure[] = [];
    if (fileTree.length > 0) {
      for (const strategy of this.strategies) {
        try {
          const ranking = await strategy.rank(fileTree, context);
          if (ranking.length > 0) {
            context.logger.info(`Selected ${ranking.length} files with the ${strategy.name} strategy`);
            return { strategy: strategy.name, ranking, failures };
          }
          failures.push({ strategy: strategy.name, message: "empty ranking" });
          context.logger.warn(`${strategy.name} strategy returned no files; falling back`);
        } catch (e) {
          failures.push({ strategy: strategy.name, message: errorMessage(e) });
          context.logger.warn(`${strategy.name} strategy failed (${errorMessage(e)}); falling back`);
        }
      }
    }
    const ranking = await this.terminal.rank(fileTree, context);
    context.logger.info(`Selected ${ranking.length} files with the ${this.terminal.name} strategy`);
    return { strategy: this.terminal.name, ranking, failures };
  }
}
