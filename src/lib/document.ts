import fs from "node:fs/promises";
import path from "node:path";
import { fenced, loadedContent, renderFileTree } from "./format.js";
import type { Session } from "./pipeline.js";
import { errorMessage } from "./utils.js";
import type { AssembledContext } from "../types.js";

export const PROJECT_PROMPT_FILE = "PROJECT_PROMPT.md";
export const GENERATE_OPERATION = "generate-document";

const HEADER = `# PROJECT_PROMPT - FOR AI ASSISTANTS ONLY

> **IMPORTANT**: This document is written for AI assistants working on this codebase.
> Developers should refer to README.md and the project documentation instead.
`;

// Fallback documents quote at most this many characters per file
const FALLBACK_FILE_CHARS = 5_000;

export interface GeneratedDocument {
  content: string;
  source: "model" | "fallback";
}

export function buildDocumentPrompt(projectName: string, ctx: AssembledContext): string {
  const data = {
    name: projectName,
    file_count: ctx.fileTree.length,
    file_tree: renderFileTree(ctx.fileTree, projectName),
    readme_content: ctx.readme,
    file_contents: ctx.contents
  };
  return `You are an expert developer analyzing a project to write a document for AI assistants, not for human readers.
Write a PROJECT_PROMPT.md that:
1. Maps the core business logic and domain rules in a structured format
2. Shows how the components interact, as logical flows
3. Identifies key decision points and the rules behind them
4. Explains the data models and their relationships
5. Prefers logical architecture over implementation detail

Project information:
${JSON.stringify(data, null, 2)}

Guidelines:
- Organize from high-level logic down to implementation details
- Use precise, consistent terminology
- State clearly what is in scope and what is not
- Include a "Logic Map" section showing the key workflows in markdown

Respond with the markdown document only.`;
}

/** Built locally from the assembled context when the model cannot be used. */
export function renderFallbackDocument(projectName: string, ctx: AssembledContext): string {
  const lines = [
    HEADER,
    "## Project Overview",
    `This is the AI-oriented documentation for ${projectName}. The project contains ${ctx.fileTree.length} files.`,
    "",
    "## File Structure Map",
    fenced(renderFileTree(ctx.fileTree, projectName)),
    "",
    "## Important Files",
    ...ctx.selected.map((f) => `- \`${f.path}\``),
    "",
    "## File Contents"
  ];
  for (const { path: rel } of ctx.selected) {
    const content = loadedContent(ctx, rel);
    if (content === undefined) continue;
    const shown =
      content.length > FALLBACK_FILE_CHARS
        ? `${content.slice(0, FALLBACK_FILE_CHARS)}\n... (truncated, full content in the source file)`
        : content;
    lines.push("", `### \`${rel}\``, fenced(shown));
  }
  lines.push(
    "",
    "## AI Assistance Guidelines",
    "- Focus on the key files listed above",
    "- Use the file structure map to find your way around",
    "- Treat the quoted file contents as the ground truth for this project",
    ""
  );
  return lines.join("\n");
}

/**
 * Ask the model for the document; any remote failure degrades to the local
 * fallback rather than failing the run.
 */
export async function generateProjectPrompt(session: Session, ctx: AssembledContext): Promise<GeneratedDocument> {
  const { logger, generator, caller, projectName } = session;
  if (!generator) {
    logger.warn("No generative model configured; writing the fallback document");
    return { content: renderFallbackDocument(projectName, ctx), source: "fallback" };
  }
  try {
    const answer = await caller.call(generator, buildDocumentPrompt(projectName, ctx), GENERATE_OPERATION);
    return { content: `${HEADER}\n${answer.trim()}\n`, source: "model" };
  } catch (e) {
    logger.error(`Document generation failed: ${errorMessage(e)}`);
    logger.warn("Writing the fallback document instead");
    return { content: renderFallbackDocument(projectName, ctx), source: "fallback" };
  }
}

export async function writeDocument(cwd: string, content: string, file = PROJECT_PROMPT_FILE): Promise<string> {
  const target = path.resolve(cwd, file);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf8");
  return target;
}
