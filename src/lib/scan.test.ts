import { describe, it, expect, beforeAll } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import { compileBaselineRules, compileIgnoreRules, mergeIgnoreRules } from './ignore.js';
import { readReadme, readTextFile, scanFileTree } from './scan.js';

const TMP_ROOT = path.join(process.cwd(), '.tmp-tests', 'scan');
const proj = path.join(TMP_ROOT, 'proj');

async function write(rel: string, content: string | Buffer) {
  const p = path.join(proj, rel);
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content);
}

describe('scanFileTree', () => {
  beforeAll(async () => {
    await fs.rm(TMP_ROOT, { recursive: true, force: true });
    await write('README.md', '# Demo\nA tiny project.\n');
    await write('a/main.py', 'print("hi")\n');
    await write('a/test_main.py', 'def test_x():\n    pass\n');
    await write('assets/logo.png', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]));
    await write('node_modules/dep/index.js', 'module.exports = 1;\n');
    await write('.env.example', 'KEY=value\n');
    await write('blob.dat.txt', Buffer.from([0x61, 0x00, 0x62]));
  });

  it('returns sorted posix paths without ignored entries', async () => {
    const rules = mergeIgnoreRules(compileBaselineRules(), compileIgnoreRules(['assets/']));
    const tree = await scanFileTree({ cwd: proj, include: [], rules });
    expect(tree).toEqual(['.env.example', 'README.md', 'a/main.py', 'a/test_main.py', 'blob.dat.txt']);
  });

  it('honours include globs', async () => {
    const tree = await scanFileTree({ cwd: proj, include: ['a/**'], rules: compileIgnoreRules([]) });
    expect(tree).toEqual(['a/main.py', 'a/test_main.py']);
  });

  it('readTextFile reports oversize and binary content', async () => {
    expect(await readTextFile(proj, 'a/main.py', 1024)).toEqual({ content: 'print("hi")\n', bytes: 12 });
    expect(await readTextFile(proj, 'a/main.py', 4)).toEqual({ bytes: 12, reason: 'too-large' });
    expect(await readTextFile(proj, 'blob.dat.txt', 1024)).toEqual({ bytes: 3, reason: 'binary-content' });
    const missing = await readTextFile(proj, 'nope.txt', 1024);
    expect(missing.content).toBeUndefined();
    expect(missing.bytes).toBe(0);
  });

  it('readReadme finds the root README', async () => {
    const readme = await readReadme(proj, ['README.md', 'a/main.py'], 10_000);
    expect(readme).toEqual({ path: 'README.md', content: '# Demo\nA tiny project.\n' });
    expect(await readReadme(proj, ['a/main.py'], 10_000)).toBeUndefined();
  });
});
