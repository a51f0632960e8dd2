import type { Logger } from "../logger.js";
import type { Readme } from "../scan.js";
import type { CandidateRanking, FileTree } from "../../types.js";

export interface SelectionContext {
  cwd: string;
  readme?: Readme;
  logger: Logger;
}

/**
 * One way of ranking a file tree. Implementations other than the rule-based one
 * signal an unusable result by throwing SelectionFailure (or any error).
 */
export interface SelectionStrategy {
  readonly name: string;
  rank(fileTree: FileTree, context: SelectionContext): Promise<CandidateRanking>;
}
