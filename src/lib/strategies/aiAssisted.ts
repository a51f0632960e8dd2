import { SelectionFailure } from "../errors.js";
import { renderFileTree } from "../format.js";
import type { ResilientCaller, TextGenerator } from "../remote.js";
import { errorMessage, isRecord, normalizeRelPath } from "../utils.js";
import type { CandidateRanking, FileTree } from "../../types.js";
import type { SelectionContext, SelectionStrategy } from "./types.js";

export const SELECT_FILES_OPERATION = "select-files";

export interface AiAssistedOptions {
  caller: ResilientCaller;
  generator: TextGenerator;
  projectName?: string;
}

export function buildSelectionPrompt(fileTree: FileTree, readme: string | undefined, projectName = "."): string {
  return `You are an expert developer analyzing a project. Identify the files that matter most for understanding
its structure, purpose and core logic.

Prioritize:
1. Files containing core business logic and domain rules
2. Files that define key workflows and processes
3. Main entry points that show how the application flows
4. Files that define data models and their relationships

Avoid style sheets, static assets, build configuration, vendored libraries and tests that do not
demonstrate business logic.

README:
${readme ?? "No README.md found."}

File tree:
${renderFileTree(fileTree, projectName)}

All paths:
${fileTree.join("\n")}

Respond with ONLY a JSON array of paths copied from the list above, most important first, for example:
["src/main.py", "lib/core.py", "models/user.py"]`;
}

function stripFence(text: string): string {
  const m = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/.exec(text.trim());
  return m ? m[1] : text.trim();
}

function asStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return undefined;
    out.push(item);
  }
  return out;
}

/** Accepts `["a", "b"]` or `{"files": ["a", "b"]}`, optionally inside a code fence. */
export function parseSelectionResponse(text: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripFence(text));
  } catch {
    throw new SelectionFailure("ai", `response is not JSON: ${text.slice(0, 80)}`);
  }
  const list = asStringList(parsed) ?? (isRecord(parsed) ? asStringList(parsed.files) : undefined);
  if (!list) throw new SelectionFailure("ai", "response is not a list of paths");
  return list;
}

export class AiAssistedStrategy implements SelectionStrategy {
  readonly name = "ai";

  constructor(private readonly options: AiAssistedOptions) {}

  async rank(fileTree: FileTree, context: SelectionContext): Promise<CandidateRanking> {
    const prompt = buildSelectionPrompt(fileTree, context.readme?.content, this.options.projectName);
    let response: string;
    try {
      response = await this.options.caller.call(this.options.generator, prompt, SELECT_FILES_OPERATION);
    } catch (e) {
      throw new SelectionFailure(this.name, errorMessage(e), { cause: e });
    }

    const known = new Set(fileTree);
    const picked: string[] = [];
    for (const raw of parseSelectionResponse(response)) {
      const rel = normalizeRelPath(raw);
      if (!known.has(rel)) {
        context.logger.debug(`Model listed unknown path: ${raw}`);
        continue;
      }
      if (!picked.includes(rel)) picked.push(rel);
    }
    if (picked.length === 0) throw new SelectionFailure(this.name, "response lists no path from the file tree");

    context.logger.info(`Model selected ${picked.length} files`);
    return picked.map((p, i) => ({ path: p, score: picked.length - i }));
  }
}
