import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { PassThrough } from 'stream';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { runCli, type CliContext } from '../program.js';
import { ExitCode } from '../errors.js';

async function writeTemplate(root: string, relativePath: string, content: string) {
  const path = join(root, ...relativePath.split('/'));
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

const MERGED_ONE_TWO = [
  '<!-- Generated by prompt-merge from 2 template(s): a/one.md, b/two.md -->',
  '',
  '<!-- source: a/one.md -->',
  '',
  '# One',
  '',
  '<!-- source: b/two.md -->',
  '',
  '# Two',
  '',
].join('\n');

describe('CLI', () => {
  let testDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  function createContext(keys?: string): CliContext {
    const input = Object.assign(new PassThrough(), {
      isTTY: keys !== undefined,
      isRaw: false,
      setRawMode: vi.fn(),
    });
    if (keys !== undefined) {
      input.write(keys);
    }
    return { cwd: testDir, input, output: { write: () => true } };
  }

  function errorLines(): string[] {
    return errorSpy.mock.calls.map((call) => call.join(' '));
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'prompt-merge-cli-'));
    await writeTemplate(testDir, 'templates/a/one.md', '# One\n');
    await writeTemplate(testDir, 'templates/b/two.md', '# Two\n');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('--list', () => {
    it('should print the catalog to stdout', async () => {
      const code = await runCli(['--list'], createContext());

      expect(code).toBe(ExitCode.Success);
      expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
        '[a]',
        '  a/one.md - One',
        '[b]',
        '  b/two.md - Two',
        '',
        'Total: 2 template(s)',
      ]);
    });

    it('should report an empty template root and succeed', async () => {
      await mkdir(join(testDir, 'empty'));

      const code = await runCli(['--list', '--root', 'empty'], createContext());

      expect(code).toBe(ExitCode.Success);
      expect(logSpy).toHaveBeenCalledWith('No templates available.');
    });

    it('should exit with the configuration code when the root is missing', async () => {
      const code = await runCli(['--list', '-r', 'missing'], createContext());

      expect(code).toBe(ExitCode.Configuration);
      expect(errorLines()).toContain(`✗ Template directory not found: ${join(testDir, 'missing')}`);
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('merge', () => {
    it('should merge the templates chosen interactively into CLAUDE.md', async () => {
      const code = await runCli([], createContext(' j \r'));

      expect(code).toBe(ExitCode.Success);
      await expect(readFile(join(testDir, 'CLAUDE.md'), 'utf-8')).resolves.toBe(MERGED_ONE_TWO);
    });

    it('should accept the go command word', async () => {
      const code = await runCli(['go', '-o', 'out.md'], createContext(' j \r'));

      expect(code).toBe(ExitCode.Success);
      await expect(readFile(join(testDir, 'out.md'), 'utf-8')).resolves.toBe(MERGED_ONE_TWO);
    });

    it('should exit cleanly and write nothing when the user cancels', async () => {
      const code = await runCli([], createContext(' q'));

      expect(code).toBe(ExitCode.Success);
      expect(errorLines()).toContain('Cancelled.');
      await expect(access(join(testDir, 'CLAUDE.md'))).rejects.toThrow();
    });

    it('should merge without prompting when templates are given', async () => {
      const code = await runCli(
        ['--select', './a/one.md', 'b/two.md', '-o', 'merged.md'],
        createContext()
      );

      expect(code).toBe(ExitCode.Success);
      await expect(readFile(join(testDir, 'merged.md'), 'utf-8')).resolves.toBe(MERGED_ONE_TWO);
      expect(errorLines()).toContain(`✓ Merged 2 template(s) into ${join(testDir, 'merged.md')}`);
    });

    it('should write to stdout for -o -', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const code = await runCli(['-s', 'b/two.md', '-o', '-'], createContext());

      expect(code).toBe(ExitCode.Success);
      expect(writeSpy).toHaveBeenCalledTimes(1);
      expect(String(writeSpy.mock.calls[0][0])).toBe(
        '<!-- Generated by prompt-merge from 1 template(s): b/two.md -->\n\n<!-- source: b/two.md -->\n\n# Two\n'
      );
    });

    it('should warn that --details does nothing outside --list', async () => {
      const code = await runCli(['-d', '-s', 'a/one.md', '-o', 'one.md'], createContext());

      expect(code).toBe(ExitCode.Success);
      expect(errorLines()).toContain('⚠ --details only applies with --list');
      await expect(readFile(join(testDir, 'one.md'), 'utf-8')).resolves.toContain('# One\n');
    });

    it('should reject a duplicated selection without writing', async () => {
      const code = await runCli(['--select', 'a/one.md', 'a/one.md'], createContext());

      expect(code).toBe(ExitCode.Validation);
      expect(errorLines()).toContain('✗ Template selected more than once: a/one.md');
      await expect(access(join(testDir, 'CLAUDE.md'))).rejects.toThrow();
    });

    it('should fail with the I/O code when the output directory is missing', async () => {
      const outputPath = join(testDir, 'no', 'such', 'out.md');

      const code = await runCli(['--select', 'a/one.md', '-o', outputPath], createContext());

      expect(code).toBe(ExitCode.IO);
      expect(errorLines()).toContain(
        `✗ Cannot write output file ${outputPath}: no such file or directory`
      );
      await expect(access(join(testDir, 'no'))).rejects.toThrow();
    });

    it('should exit with the configuration code when the root is missing', async () => {
      const code = await runCli(['--root', 'missing'], createContext(' \r'));

      expect(code).toBe(ExitCode.Configuration);
      expect(errorLines()).toContain(`✗ Template directory not found: ${join(testDir, 'missing')}`);
    });

    it('should require a terminal for interactive selection', async () => {
      const code = await runCli([], createContext());

      expect(code).toBe(ExitCode.Configuration);
      expect(errorLines()).toContain(
        '✗ Interactive selection needs a terminal; use --select to choose templates'
      );
    });

    it('should refuse to prompt over an empty catalog', async () => {
      await mkdir(join(testDir, 'empty'));

      const code = await runCli(['-r', 'empty'], createContext(' \r'));

      expect(code).toBe(ExitCode.Configuration);
      expect(errorLines()).toContain(`✗ No templates available in ${join(testDir, 'empty')}`);
    });

    it('should use root and output from the config file', async () => {
      await writeTemplate(testDir, 'prompts/only.md', '# Only\n');
      await writeFile(
        join(testDir, 'prompt-merge.config.json'),
        JSON.stringify({ templates: { root: 'prompts' }, output: { path: 'AGENTS.md' } })
      );

      const code = await runCli(['-s', 'only.md'], createContext());

      expect(code).toBe(ExitCode.Success);
      await expect(readFile(join(testDir, 'AGENTS.md'), 'utf-8')).resolves.toBe(
        '<!-- Generated by prompt-merge from 1 template(s): only.md -->\n\n<!-- source: only.md -->\n\n# Only\n'
      );
    });
  });

  describe('usage', () => {
    let stderrSpy: MockInstance<typeof process.stderr.write>;

    beforeEach(() => {
      stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    it('should exit with the usage code on an unknown flag', async () => {
      const code = await runCli(['--frobnicate'], createContext());

      expect(code).toBe(ExitCode.Usage);
      expect(stderrSpy).toHaveBeenCalledWith("error: unknown option '--frobnicate'\n");
    });

    it('should exit with the usage code on an unknown command word', async () => {
      const code = await runCli(['merge-all'], createContext());

      expect(code).toBe(ExitCode.Usage);
    });

    it('should exit successfully after printing the version', async () => {
      const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const code = await runCli(['--version'], createContext());

      expect(code).toBe(ExitCode.Success);
      expect(stdoutSpy).toHaveBeenCalledWith('0.1.0\n');
    });
  });
});
