import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import * as os from 'node:os';
import type { Reporter } from '../diagnostics.js';
import { noteToJson } from '../note.js';
import { VaultError, findNoteFiles, openVault, readNote, scanNotes, scanVault } from '../scanner.js';

const { describe, it, beforeEach, afterEach } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));
const vault = path.join(__dirname, 'fixtures', 'vault');

function captureReporter(): { reporter: Reporter; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    reporter: {
      log: message => { out.push(message); },
      error: message => { err.push(message); }
    },
    out,
    err
  };
}

describe('openVault', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fmq-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should resolve an existing directory', async () => {
    assert.strictEqual(await openVault(tempDir), path.resolve(tempDir));
  });

  it('should reject a missing path', async () => {
    const missing = path.join(tempDir, 'missing');

    await assert.rejects(openVault(missing), {
      name: 'VaultError',
      message: `Vault path does not exist: ${missing}`
    });
  });

  it('should reject a file', async () => {
    const file = path.join(tempDir, 'note.md');
    fs.writeFileSync(file, '# Note');

    await assert.rejects(openVault(file), VaultError);
  });
});

describe('findNoteFiles', () => {
  it('should find markdown files recursively, sorted, skipping hidden entries', async () => {
    const files = await findNoteFiles(vault);

    assert.deepStrictEqual(files, [
      path.join(vault, 'broken.md'),
      path.join(vault, 'journal', '2024-01-05.md'),
      path.join(vault, 'projects', 'alpha.md'),
      path.join(vault, 'projects', 'beta.md')
    ]);
  });

  it('should include hidden entries when asked', async () => {
    const files = await findNoteFiles(vault, { includeHidden: true });

    assert.ok(files.includes(path.join(vault, '.obsidian', 'workspace.md')));
    assert.strictEqual(files.length, 5);
  });

  it('should honor the extension list', async () => {
    const files = await findNoteFiles(vault, { extensions: ['.txt'] });

    assert.deepStrictEqual(files, [path.join(vault, 'readme.txt')]);
  });
});

describe('readNote', () => {
  it('should read a note without frontmatter', async () => {
    const { note, warning } = await readNote(path.join(vault, 'journal', '2024-01-05.md'));

    assert.strictEqual(warning, undefined);
    assert.strictEqual(note?.title, '2024-01-05');
    assert.strictEqual(note?.metadata.size, 0);
  });

  it('should repair a colon value and report it', async () => {
    const notePath = path.join(vault, 'projects', 'beta.md');
    const { note, warning } = await readNote(notePath);

    assert.deepStrictEqual(note?.metadata.get('source'), { kind: 'string', value: 'Handbook: Chapter 3' });
    assert.ok(warning?.startsWith(`Used lenient parsing for frontmatter in file ${notePath} due to: `));
  });
});

describe('scanVault', () => {
  it('should scan every note and summarize', async () => {
    const { reporter, out } = captureReporter();
    const result = await scanVault(vault, { reporter, concurrency: 2 });

    assert.strictEqual(result.total, 4);
    assert.strictEqual(result.notes.length, 4);
    assert.deepStrictEqual(result.summary, [
      'Successfully parsed 4 of 4 notes',
      'Fixed 1 files with lenient parsing (frontmatter with colons in values)',
      'Errors in 1 files:',
      '  - Frontmatter parsing errors: 1 files',
      'Use --verbose/-v to see detailed error messages'
    ]);
    assert.deepStrictEqual(out, result.summary);
    assert.ok(result.diagnostics.isFinalized);
  });

  it('should keep unrepaired notes with empty metadata in strict mode', async () => {
    const { reporter } = captureReporter();
    const result = await scanVault(vault, { reporter, lenient: false, silent: true });

    const beta = result.notes.find(n => n.path.endsWith('beta.md'));
    assert.strictEqual(beta?.metadata.size, 0);
    assert.strictEqual(result.diagnostics.repairedCount, 0);
    assert.deepStrictEqual(result.diagnostics.categoryCounts, new Map([['Frontmatter parsing errors', 2]]));
  });

  it('should print progress when verbose', async () => {
    const { reporter, out } = captureReporter();
    await scanVault(vault, { reporter, verbose: true });

    assert.strictEqual(out[0], `Scanning vault: ${vault}`);
    assert.strictEqual(out[1], 'Found 4 markdown files');
  });

  it('should give the same notes at any concurrency', async () => {
    const { reporter } = captureReporter();
    const byPath = (notes: ReturnType<typeof noteToJson>[]) =>
      notes.sort((a, b) => a.path.localeCompare(b.path));

    const serial = await scanVault(vault, { reporter, silent: true, concurrency: 1 });
    const parallel = await scanVault(vault, { reporter, silent: true, concurrency: 8 });

    assert.deepStrictEqual(byPath(parallel.notes.map(noteToJson)), byPath(serial.notes.map(noteToJson)));
  });
});

describe('scanNotes', () => {
  it('should drop unreadable files and record a critical', async () => {
    const { reporter, err } = captureReporter();
    const missing = path.join(vault, 'missing.md');
    const result = await scanNotes([path.join(vault, 'projects', 'alpha.md'), missing], { reporter, silent: true });

    assert.strictEqual(result.notes.length, 1);
    assert.strictEqual(result.notes[0].title, 'Alpha Project');
    assert.strictEqual(err.length, 1);
    assert.ok(err[0].startsWith('Error: Failed to read file: ENOENT'));
    assert.ok(err[0].endsWith(`(${missing})`));
    assert.deepStrictEqual(result.summary, [
      'Successfully parsed 1 of 2 notes',
      'Errors in 1 files:',
      '  - File read errors: 1 files',
      'Use --verbose/-v to see detailed error messages'
    ]);
  });

  it('should summarize an empty candidate list', async () => {
    const { reporter } = captureReporter();
    const result = await scanNotes([], { reporter, silent: true });

    assert.deepStrictEqual(result.notes, []);
    assert.deepStrictEqual(result.summary, ['Successfully parsed 0 of 0 notes']);
  });
});

describe('unreadable directories', () => {
  let tempDir: string;
  const locked = () => path.join(tempDir, 'locked');
  // Permission bits do not stop root
  const runningAsRoot = process.getuid?.() === 0;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fmq-test-'));
    fs.writeFileSync(path.join(tempDir, 'a.md'), '---\ntitle: Readable\n---\n');
    fs.mkdirSync(locked());
    fs.writeFileSync(path.join(locked(), 'b.md'), '---\ntitle: Hidden away\n---\n');
    fs.chmodSync(locked(), 0o000);
  });

  afterEach(() => {
    fs.chmodSync(locked(), 0o755);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should skip a subdirectory it cannot list and keep scanning', { skip: runningAsRoot }, async () => {
    const { reporter } = captureReporter();
    const skipped: string[] = [];
    const result = await scanVault(tempDir, {
      reporter,
      silent: true,
      onUnreadable: dir => { skipped.push(dir); }
    });

    assert.deepStrictEqual(result.notes.map(n => n.path), [path.join(tempDir, 'a.md')]);
    assert.deepStrictEqual(skipped, [locked()]);
    assert.deepStrictEqual(result.diagnostics.categoryCounts, new Map([['File read errors', 1]]));
    assert.strictEqual(result.summary[0], 'Successfully parsed 1 of 1 notes');
  });

  it('should still fail when the root itself cannot be listed', async () => {
    await assert.rejects(findNoteFiles(path.join(tempDir, 'missing')), { code: 'ENOENT' });
  });
});

describe('scan concurrency', () => {
  const alpha = path.join(vault, 'projects', 'alpha.md');

  it('should fall back to one lane for an unusable concurrency', async () => {
    for (const concurrency of [NaN, 0, -2, 1.5]) {
      const { reporter } = captureReporter();
      const result = await scanNotes([alpha], { reporter, silent: true, concurrency });

      assert.strictEqual(result.notes.length, 1);
      assert.deepStrictEqual(result.summary, ['Successfully parsed 1 of 1 notes']);
    }
  });
});
