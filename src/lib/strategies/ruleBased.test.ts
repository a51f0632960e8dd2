import { describe, it, expect } from 'vitest';
import { compileIgnoreRules, filterFileTree } from '../ignore.js';
import { categorize, rankByRules, RuleBasedStrategy } from './ruleBased.js';

describe('categorize', () => {
  it.each([
    ['src/index.ts', 'entry'],
    ['a/main.py', 'entry'],
    ['package.json', 'config'],
    ['Dockerfile', 'config'],
    ['README.md', 'docs'],
    ['docs/README.md', 'text'],
    ['src/models/user.ts', 'core'],
    ['scripts/build.sh', 'source'],
    ['notes.txt', 'text'],
    ['a/test_main.py', 'test'],
    ['src/app.test.ts', 'test'],
    ['tests/helpers.py', 'test'],
    ['styles/site.css', 'excluded'],
    ['yarn.lock', 'excluded'],
    ['public/vendor.min.js', 'excluded'],
    ['src/__snapshots__/a.snap', 'excluded'],
  ])('%s is %s', (p, category) => {
    expect(categorize(p)).toBe(category);
  });
});

describe('rankByRules', () => {
  it('ranks entry points above tests and never surfaces ignored assets', async () => {
    const tree = ['a/main.py', 'a/test_main.py', 'assets/logo.png', 'README.md'];
    const filtered = filterFileTree(compileIgnoreRules(['assets/'], 'test'), tree);
    const ranking = await new RuleBasedStrategy().rank(filtered);

    expect(ranking.map((r) => r.path)).toEqual(['a/main.py', 'README.md', 'a/test_main.py']);
    expect(ranking.map((r) => r.score)).toEqual([100, 60, 5]);
  });

  it('breaks weight ties by depth, then lexically', () => {
    expect(rankByRules(['src/z/deep.ts', 'src/b.ts', 'src/a.ts']).map((r) => r.path)).toEqual([
      'src/a.ts',
      'src/b.ts',
      'src/z/deep.ts',
    ]);
  });

  it('drops excluded files when anything else is left', () => {
    expect(rankByRules(['site.css', 'main.go']).map((r) => r.path)).toEqual(['main.go']);
  });

  it('re-admits excluded files rather than return nothing', () => {
    expect(rankByRules(['b.css', 'a.css'])).toEqual([
      { path: 'a.css', score: 1 },
      { path: 'b.css', score: 1 },
    ]);
  });

  it('returns nothing for an empty tree', () => {
    expect(rankByRules([])).toEqual([]);
  });

  it('is usable through the strategy interface without a context', async () => {
    const ranking = await new RuleBasedStrategy().rank(['x.md']);
    expect(ranking).toEqual([{ path: 'x.md', score: 10 }]);
  });
});
