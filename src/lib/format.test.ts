import { describe, it, expect } from 'vitest';
import { fenced, langForFile, loadedContent, renderFileTree, renderJson, renderMarkdown, renderPreamble } from './format.js';
import type { AssembledContext } from '../types.js';

const ctx: AssembledContext = {
  fileTree: ['README.md', 'src/main.py', 'src/lib/util.py'],
  selected: [
    { path: 'src/main.py', score: 100 },
    { path: 'src/lib/util.py', score: 50 },
  ],
  contents: { 'src/main.py': 'print("hi")\n' },
  readme: '# Demo',
  totalTokens: 3,
  reservedTokens: 10,
  tokenLimit: 100,
  budget: 95,
  tokenSource: 'estimated',
  strategy: 'rules',
  skipped: [{ path: 'src/lib/util.py', estimate: 500, remaining: 82, reason: 'over-budget' }],
};

describe('renderFileTree', () => {
  it('lists directories before files with box-drawing branches', () => {
    expect(renderFileTree(ctx.fileTree, 'demo')).toBe(
      ['demo/', '├─ src/', '│  ├─ lib/', '│  │  └─ util.py', '│  └─ main.py', '└─ README.md'].join('\n'),
    );
  });
});

describe('fenced', () => {
  it('uses a fence longer than any backtick run in the content', () => {
    expect(fenced('a ``` b', 'md')).toBe('````md\na ``` b\n````');
    expect(fenced('plain\n\n')).toBe('```\nplain\n```');
  });
});

describe('langForFile', () => {
  it('maps extensions and well-known names', () => {
    expect(langForFile('a/b.py')).toBe('python');
    expect(langForFile('Dockerfile')).toBe('dockerfile');
    expect(langForFile('notes.unknown')).toBe('');
  });
});

describe('renderMarkdown', () => {
  it('renders the preamble then each loaded file in ranking order', () => {
    const md = renderMarkdown(ctx, 'demo');
    expect(md.startsWith(renderPreamble('demo', ctx.fileTree, ctx.readme))).toBe(true);
    expect(md.endsWith('## Files\n\n### `src/main.py`\n\n```python\nprint("hi")\n```\n')).toBe(true);
    expect(md).not.toContain('### `src/lib/util.py`');
  });
});

describe('renderJson', () => {
  it('includes loaded files with their scores and the skip log', () => {
    const parsed = JSON.parse(renderJson(ctx, 'demo'));
    expect(parsed.files).toEqual([{ path: 'src/main.py', score: 100, content: 'print("hi")\n' }]);
    expect(parsed.skipped).toEqual(ctx.skipped);
    expect(parsed.strategy).toBe('rules');
  });
});

describe('loadedContent', () => {
  const unloaded: AssembledContext = { ...ctx, selected: [{ path: 'toString', score: 1 }], contents: {} };

  it('ignores inherited object members', () => {
    expect(loadedContent(unloaded, 'toString')).toBeUndefined();
    expect(loadedContent(ctx, 'src/main.py')).toBe('print("hi")\n');
  });

  it('renders nothing for a selected path without content', () => {
    expect(JSON.parse(renderJson(unloaded, 'demo')).files).toEqual([]);
    expect(renderMarkdown(unloaded, 'demo')).not.toContain('### `toString`');
  });
});
