import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { SearchRequest } from '../../../config/types.js';
import { grepSearch, search } from '../../../lib/grep.js';
import type { SandboxPathResolver } from '../../../lib/sandbox/resolver.js';
import {
  numberedLines,
  type SandboxFixture,
  withSandboxFixture,
  writeTree,
} from '../fixtures/sandbox-fixture.js';

function requestFor(
  fixture: SandboxFixture,
  overrides: Partial<SearchRequest> & Pick<SearchRequest, 'pattern'>
): SearchRequest {
  return {
    path: '.',
    sandbox: fixture.sandbox,
    recursive: true,
    ...overrides,
  };
}

void describe('grepSearch', () => {
  withSandboxFixture((getFixture) => {
    void it('skips ignored directories during a recursive search', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'src/app.py': "def main():\n    print('TODO: refactor')\n",
        'node_modules/pkg/index.js': '// TODO vendor\n',
        'README.md': 'TODO list\n',
      });

      const result = await grepSearch(requestFor(fixture, { pattern: 'TODO' }), {
        resolver: fixture.resolver,
      });

      assert.deepEqual(result, {
        success: true,
        pattern: 'TODO',
        path: '.',
        recursive: true,
        matches: [
          { file: 'README.md', line_number: 1, line_content: 'TODO list' },
          {
            file: path.join('src', 'app.py'),
            line_number: 2,
            line_content: "print('TODO: refactor')",
          },
        ],
        total_matches: 2,
      });
    });

    void it('finds hello only outside node_modules', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'src/foo.txt': 'hello world',
        'node_modules/bar.txt': 'hello world',
      });

      const result = await grepSearch(requestFor(fixture, { pattern: 'hello' }), {
        resolver: fixture.resolver,
      });

      assert.ok('success' in result);
      assert.equal(result.total_matches, 1);
      assert.deepEqual(result.matches, [
        {
          file: path.join('src', 'foo.txt'),
          line_number: 1,
          line_content: 'hello world',
        },
      ]);
    });

    void it('finds TODO in notes.txt but not in icon.png', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'notes.txt': 'TODO: fix',
        'icon.png': 'TODO: fix',
      });

      for (const recursive of [false, true]) {
        const result = await grepSearch(
          requestFor(fixture, { pattern: 'TODO', recursive }),
          { resolver: fixture.resolver }
        );

        assert.ok('success' in result);
        assert.deepEqual(result.matches, [
          { file: 'notes.txt', line_number: 1, line_content: 'TODO: fix' },
        ]);
      }
    });

    void it('skips binary files by extension', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'icon.png': 'TODO hidden in an image\n',
        'notes.txt': 'first\nTODO second\n',
      });

      const result = await grepSearch(requestFor(fixture, { pattern: 'TODO' }), {
        resolver: fixture.resolver,
      });

      assert.ok('success' in result);
      assert.deepEqual(result.matches, [
        { file: 'notes.txt', line_number: 2, line_content: 'TODO second' },
      ]);
    });

    void it('returns an empty result for an empty session', async () => {
      const fixture = getFixture();

      const result = await grepSearch(requestFor(fixture, { pattern: 'x' }), {
        resolver: fixture.resolver,
      });

      assert.deepEqual(result, {
        success: true,
        pattern: 'x',
        path: '.',
        recursive: true,
        matches: [],
        total_matches: 0,
      });
    });

    void it('stops at 1000 matches and warns', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'big.txt': numberedLines(1100, 'match line'),
      });

      const result = await grepSearch(
        requestFor(fixture, { pattern: 'match' }),
        { resolver: fixture.resolver }
      );

      assert.ok('success' in result);
      assert.equal(result.total_matches, 1000);
      assert.equal(result.matches.length, 1000);
      assert.deepEqual(result.matches.at(-1), {
        file: 'big.txt',
        line_number: 1000,
        line_content: 'match line 1000',
      });
      assert.equal(
        result.warning,
        'Stopped early after reaching MAX_MATCHES=1000'
      );
    });

    void it('does not warn for exactly 1000 matches', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'exact.txt': numberedLines(1000, 'match line'),
      });

      const result = await grepSearch(
        requestFor(fixture, { pattern: 'match' }),
        { resolver: fixture.resolver }
      );

      assert.ok('success' in result);
      assert.equal(result.total_matches, 1000);
      assert.equal('warning' in result, false);
    });

    void it('applies a lower per-call cap across files', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'a.txt': 'hit\n',
        'b.txt': 'hit\nhit\n',
      });

      const result = await grepSearch(requestFor(fixture, { pattern: 'hit' }), {
        resolver: fixture.resolver,
        maxMatches: 2,
      });

      assert.ok('success' in result);
      assert.deepEqual(result.matches, [
        { file: 'a.txt', line_number: 1, line_content: 'hit' },
        { file: 'b.txt', line_number: 1, line_content: 'hit' },
      ]);
      assert.equal(result.warning, 'Stopped early after reaching MAX_MATCHES=2');
    });

    void it('rejects an invalid pattern before touching the sandbox', async () => {
      const fixture = getFixture();
      let resolveCalls = 0;
      const resolver: SandboxPathResolver = {
        resolve: () => {
          resolveCalls++;
          return Promise.resolve(fixture.sessionRoot);
        },
        sessionRoot: () => fixture.sessionRoot,
      };

      const result = await grepSearch(
        requestFor(fixture, { pattern: '(unclosed' }),
        { resolver }
      );

      assert.deepEqual(result, {
        error: 'Invalid regex pattern: Unterminated group',
      });
      assert.equal(resolveCalls, 0);
    });

    void it('rejects patterns at risk of catastrophic backtracking', async () => {
      const fixture = getFixture();

      const result = await grepSearch(
        requestFor(fixture, { pattern: '(a+)+$' }),
        { resolver: fixture.resolver, redosGuard: true }
      );

      assert.deepEqual(result, {
        error: 'Invalid regex pattern: potentially catastrophic backtracking',
      });
    });

    void it('returns identical results for identical requests', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'b/one.txt': 'alpha\nbeta\n',
        'a/two.txt': 'beta\n',
        'c.txt': 'beta gamma\n',
      });
      const request = requestFor(fixture, { pattern: 'beta' });

      const first = await grepSearch(request, { resolver: fixture.resolver });
      const second = await grepSearch(request, { resolver: fixture.resolver });

      assert.deepEqual(first, second);
      assert.ok('success' in first);
      assert.deepEqual(
        first.matches.map((match) => match.file),
        ['c.txt', path.join('a', 'two.txt'), path.join('b', 'one.txt')]
      );
    });

    void it('searches only the top directory when not recursive', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'top.txt': 'needle\n',
        'sub/deep.txt': 'needle\n',
      });

      const result = await grepSearch(
        requestFor(fixture, { pattern: 'needle', recursive: false }),
        { resolver: fixture.resolver }
      );

      assert.ok('success' in result);
      assert.equal(result.recursive, false);
      assert.deepEqual(result.matches, [
        { file: 'top.txt', line_number: 1, line_content: 'needle' },
      ]);
    });

    void it('searches a single file target', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'notes/todo.md': '- [ ] ship it\n- [x] test it\n',
      });

      const result = await grepSearch(
        requestFor(fixture, {
          path: 'notes/todo.md',
          pattern: '\\[ \\]',
          recursive: false,
        }),
        { resolver: fixture.resolver }
      );

      assert.ok('success' in result);
      assert.deepEqual(result.matches, [
        {
          file: path.join('notes', 'todo.md'),
          line_number: 1,
          line_content: '- [ ] ship it',
        },
      ]);
    });

    void it('reports display paths relative to the session root', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, { 'src/lib/util.ts': 'export {};\n' });

      const result = await grepSearch(
        requestFor(fixture, { path: '/src', pattern: 'export' }),
        { resolver: fixture.resolver }
      );

      assert.ok('success' in result);
      assert.equal(result.path, '/src');
      assert.deepEqual(result.matches, [
        {
          file: path.join('src', 'lib', 'util.ts'),
          line_number: 1,
          line_content: 'export {};',
        },
      ]);
    });

    void it('skips files that are not valid UTF-8', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, {
        'a.bin.txt': Uint8Array.from([0x6b, 0x65, 0x79, 0x0a, 0xc3, 0x28]),
        'b.txt': 'key\n',
      });

      const result = await grepSearch(requestFor(fixture, { pattern: 'key' }), {
        resolver: fixture.resolver,
      });

      assert.ok('success' in result);
      assert.deepEqual(result.matches, [
        { file: 'b.txt', line_number: 1, line_content: 'key' },
      ]);
    });

    void it('refuses paths outside the session', async () => {
      const fixture = getFixture();

      const result = await grepSearch(
        requestFor(fixture, { path: '../x', pattern: 'x' }),
        { resolver: fixture.resolver }
      );

      assert.deepEqual(result, {
        error:
          "Failed to perform grep search: Access denied: Path '../x' is outside the session sandbox.",
      });
    });

    void it(
      'does not follow symbolic links out of the session',
      { skip: process.platform === 'win32' },
      async () => {
        const fixture = getFixture();
        await writeTree(fixture.baseDir, { 'outside/secret.txt': 'secret\n' });
        await writeTree(fixture.sessionRoot, { 'inside.txt': 'secret\n' });
        await fs.symlink(
          path.join(fixture.baseDir, 'outside'),
          path.join(fixture.sessionRoot, 'escape')
        );

        const direct = await grepSearch(
          requestFor(fixture, { path: 'escape', pattern: 'secret' }),
          { resolver: fixture.resolver }
        );
        const walked = await grepSearch(
          requestFor(fixture, { pattern: 'secret' }),
          { resolver: fixture.resolver }
        );

        assert.deepEqual(direct, {
          error:
            "Failed to perform grep search: Access denied: Path 'escape' is outside the session sandbox.",
        });
        assert.ok('success' in walked);
        assert.deepEqual(walked.matches, [
          { file: 'inside.txt', line_number: 1, line_content: 'secret' },
        ]);
      }
    );

    void it('reports a missing target', async () => {
      const fixture = getFixture();

      const result = await grepSearch(
        requestFor(fixture, { path: 'missing', pattern: 'x' }),
        { resolver: fixture.resolver }
      );

      assert.deepEqual(result, { error: 'Directory or file not found: missing' });
    });

    void it('reports a path through a file as missing', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, { 'file.txt': 'x\n' });

      const result = await grepSearch(
        requestFor(fixture, { path: 'file.txt/child', pattern: 'x' }),
        { resolver: fixture.resolver }
      );

      assert.deepEqual(result, {
        error: 'Directory or file not found: file.txt/child',
      });
    });

    void it('rejects identifiers that are not single segments', async () => {
      const fixture = getFixture();

      const result = await grepSearch(
        {
          path: '.',
          pattern: 'x',
          sandbox: { ...fixture.sandbox, workspaceId: 'a/b' },
          recursive: false,
        },
        { resolver: fixture.resolver }
      );

      assert.deepEqual(result, {
        error:
          'Failed to perform grep search: Invalid workspace_id: must be a single non-empty path segment',
      });
    });

    void it('reports unexpected failures as a search failure', async () => {
      const fixture = getFixture();
      const resolver: SandboxPathResolver = {
        resolve: () => Promise.reject(new Error('resolver exploded')),
        sessionRoot: () => fixture.sessionRoot,
      };

      const result = await grepSearch(requestFor(fixture, { pattern: 'x' }), {
        resolver,
      });

      assert.deepEqual(result, {
        error: 'Failed to perform grep search: resolver exploded',
      });
    });
  });
});

void describe('search', () => {
  withSandboxFixture((getFixture) => {
    void it('matches grepSearch for the same arguments', async () => {
      const fixture = getFixture();
      await writeTree(fixture.sessionRoot, { 'a.txt': 'one\ntwo\n' });
      const { workspaceId, agentId, sessionId } = fixture.sandbox;

      const positional = await search(
        '.',
        'o',
        workspaceId,
        agentId,
        sessionId,
        false,
        { resolver: fixture.resolver }
      );
      const named = await grepSearch(
        requestFor(fixture, { pattern: 'o', recursive: false }),
        { resolver: fixture.resolver }
      );

      assert.deepEqual(positional, named);
    });
  });
});
