import path from 'path';
import { createRunner, reportsToEntries, runAll } from '../../../src/harness/harness.js';
import { InProcessRunner } from '../../../src/harness/in-process-runner.js';
import { SubprocessRunner } from '../../../src/harness/subprocess-runner.js';
import type { OutputChannel } from '../../../src/harness/output-channel.js';
import type { ExecutionRequest, ExecutionRunner } from '../../../src/harness/types.js';
import { Repository } from '../../../src/repo/repository.js';
import { DELETE, keep } from '../../../src/repo/types.js';

// Sources live only in memory; the root is never created on disk.
const ROOT = path.resolve('/tmp/wb-harness-virtual');

function repoOf(files: Record<string, string | null>): Repository {
  return new Repository(
    ROOT,
    Object.entries(files).map(([relativePath, text]) => ({
      relativePath,
      content: text === null ? DELETE : keep(text),
    })),
  );
}

describe('runAll with the in-process runner', () => {
  it('returns null for an empty repository', async () => {
    expect(await runAll(repoOf({}))).toBeNull();
  });

  it('returns null when every file succeeds and outputs are not requested', async () => {
    expect(await runAll(repoOf({ 'a.js': "console.log('hi');\n" }))).toBeNull();
  });

  it('reports each file with only its own output', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': "console.log('from a');\n",
        'b.js': "console.log('from b');\n",
      }),
      { withOutputs: true },
    );
    expect(reports).toEqual([
      { path: 'a.js', text: 'from a\n' },
      { path: 'b.js', text: 'from b\n' },
    ]);
  });

  it('resolves relative requires against in-memory sources', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': 'exports.x = 1;\n',
        'b.js': "const { x } = require('./a');\nconsole.log(x * 2);\n",
      }),
      { withOutputs: true },
    );
    expect(reports).toEqual([{ path: 'b.js', text: '2\n' }]);
  });

  it('shares globals between files of the same run', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': 'counter = 41;\n',
        'b.js': 'console.log(counter + 1);\n',
      }),
      { withOutputs: true },
    );
    expect(reports).toEqual([{ path: 'b.js', text: '42\n' }]);
  });

  it('records a failure with the output printed before it and keeps going', async () => {
    const reports = await runAll(
      repoOf({
        'bad.js': "console.log('before');\nthrow new Error('boom');\n",
        'good.js': "console.log('after');\n",
      }),
    );
    expect(reports).toHaveLength(1);
    expect(reports?.[0].path).toBe('bad.js');
    expect(reports?.[0].text).toMatch(/^STDOUT:\nbefore\nError: boom\n/);
  });

  it('formats thrown non-error values', async () => {
    expect(await runAll(repoOf({ 'a.js': "throw 'oops';\n" }))).toEqual([
      { path: 'a.js', text: 'STDOUT:\nUncaught oops' },
    ]);
  });

  it('reports syntax errors as failures', async () => {
    const reports = await runAll(repoOf({ 'a.js': 'function (\n' }));
    expect(reports?.[0].text).toContain('SyntaxError');
  });

  it('leaves failures out when errors are not requested', async () => {
    expect(await runAll(repoOf({ 'a.js': "throw new Error('boom');\n" }), { withErrors: false })).toBeNull();
  });

  it('skips delete records', async () => {
    expect(await runAll(repoOf({ 'gone.js': null }), { withOutputs: true })).toBeNull();
  });

  it('reports a missing relative module', async () => {
    const reports = await runAll(repoOf({ 'a.js': "require('./nope');\n" }));
    expect(reports?.[0].text).toContain(`Cannot find module './nope' from '${path.join(ROOT, 'a.js')}'`);
  });
});

describe('in-process globals', () => {
  async function outputOf(source: string): Promise<unknown> {
    return runAll(repoOf({ 'a.js': source }), { withOutputs: true });
  }

  it('exposes process.env', async () => {
    expect(await outputOf('console.log(typeof process.env);\n')).toEqual([{ path: 'a.js', text: 'object\n' }]);
  });

  it('routes process.stdout.write to the file report', async () => {
    expect(await outputOf("process.stdout.write('w\\n');\n")).toEqual([{ path: 'a.js', text: 'w\n' }]);
  });

  it('waits for setTimeout callbacks', async () => {
    expect(await outputOf("setTimeout(() => console.log('later'), 5);\nconsole.log('now');\n")).toEqual([
      { path: 'a.js', text: 'now\nlater\n' },
    ]);
  });

  it('runs setInterval until it is cleared', async () => {
    const source = [
      'let n = 0;',
      'const id = setInterval(() => {',
      '  n += 1;',
      "  console.log('tick ' + n);",
      '  if (n === 2) clearInterval(id);',
      '}, 1);',
      '',
    ].join('\n');
    expect(await outputOf(source)).toEqual([{ path: 'a.js', text: 'tick 1\ntick 2\n' }]);
  });

  it('runs setImmediate callbacks and honours clearTimeout', async () => {
    const source = "const t = setTimeout(() => console.log('never'), 5);\nclearTimeout(t);\nsetImmediate(() => console.log('soon'));\n";
    expect(await outputOf(source)).toEqual([{ path: 'a.js', text: 'soon\n' }]);
  });

  it('runs queueMicrotask callbacks', async () => {
    expect(await outputOf("queueMicrotask(() => console.log('micro'));\n")).toEqual([{ path: 'a.js', text: 'micro\n' }]);
  });

  it('exposes structuredClone', async () => {
    expect(await outputOf('console.log(structuredClone({ a: 1 }).a);\n')).toEqual([{ path: 'a.js', text: '1\n' }]);
  });

  it('treats process.exit(0) as a successful end of the file', async () => {
    expect(await outputOf("console.log('bye');\nprocess.exit(0);\nconsole.log('unreachable');\n")).toEqual([
      { path: 'a.js', text: 'bye\n' },
    ]);
  });

  it('treats a non-zero process.exit as a failure', async () => {
    expect(await runAll(repoOf({ 'a.js': 'process.exit(2);\n' }))).toEqual([
      { path: 'a.js', text: 'STDOUT:\nError: process.exit(2) called\n' },
    ]);
  });
});

describe('in-process failures after the first turn', () => {
  it('reports an error thrown from a timer callback', async () => {
    const reports = await runAll(repoOf({ 'a.js': "setTimeout(() => {\n  throw new Error('tick');\n}, 0);\n" }));
    expect(reports).toHaveLength(1);
    expect(reports?.[0].text).toMatch(/^STDOUT:\nError: tick\n/);
  });

  it('reports an unhandled async rejection as the file failure', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': "async function main() {\n  throw new Error('async boom');\n}\nmain();\n",
        'b.js': "console.log('b ran');\n",
      }),
    );
    expect(reports).toHaveLength(1);
    expect(reports?.[0].path).toBe('a.js');
    expect(reports?.[0].text).toMatch(/^STDOUT:\nError: async boom\n/);
    expect(reports?.[0].text).not.toContain('in-process-runner');
  });

  it('accepts a rejection handled with catch', async () => {
    const source = "async function f() {\n  throw new Error('x');\n}\nf().catch(() => console.log('caught'));\n";
    expect(await runAll(repoOf({ 'a.js': source }), { withOutputs: true })).toEqual([{ path: 'a.js', text: 'caught\n' }]);
  });

  it('accepts a rejection awaited inside try/catch', async () => {
    const source = [
      'async function f() {',
      "  throw new Error('x');",
      '}',
      'async function main() {',
      '  try {',
      '    await f();',
      '  } catch {',
      "    console.log('handled');",
      '  }',
      '}',
      'main();',
      '',
    ].join('\n');
    expect(await runAll(repoOf({ 'a.js': source }), { withOutputs: true })).toEqual([{ path: 'a.js', text: 'handled\n' }]);
  });
});

describe('in-process output routing', () => {
  it('prints helper output into the file that calls the helper', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': "exports.hello = () => console.log('hi from helper');\n",
        'b.js': "require('./a').hello();\nconsole.log('b done');\n",
      }),
      { withOutputs: true },
    );
    expect(reports).toEqual([{ path: 'b.js', text: 'hi from helper\nb done\n' }]);
  });

  it('keeps a failed file output out of the next report', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': "console.log('X');\nthrow new Error('fail');\n",
        'b.js': "console.log('Y');\n",
      }),
      { withOutputs: true },
    );
    expect(reports).toHaveLength(2);
    expect(reports?.[0].path).toBe('a.js');
    expect(reports?.[0].text.startsWith('STDOUT:\nX\nError: fail\n')).toBe(true);
    expect(reports?.[1]).toEqual({ path: 'b.js', text: 'Y\n' });
  });

  it('keeps delayed output with the file that scheduled it', async () => {
    const reports = await runAll(
      repoOf({
        'a.js': "setTimeout(() => console.log('late'), 20);\n",
        'b.js': "console.log('b');\n",
      }),
      { withOutputs: true },
    );
    expect(reports).toEqual([
      { path: 'a.js', text: 'late\n' },
      { path: 'b.js', text: 'b\n' },
    ]);
  });

  it('cuts the trace at the first frame outside the executed files', async () => {
    const reports = await runAll(repoOf({ 'a.js': "throw new Error('boom');\n" }));
    const trace = reports?.[0].text ?? '';
    expect(trace).toContain(path.join(ROOT, 'a.js'));
    expect(trace).not.toContain('in-process-runner');
    expect(trace.endsWith('\n')).toBe(true);
  });
});

describe('runAll with a custom runner', () => {
  it('passes module ids and absolute paths to the runner', async () => {
    const seen: ExecutionRequest[] = [];
    const runner: ExecutionRunner = {
      async execute(request: ExecutionRequest, channel: OutputChannel) {
        seen.push(request);
        channel.write(`ran ${request.moduleId}`);
      },
    };
    const reports = await runAll(repoOf({ 'pkg/util.js': 'x' }), { withOutputs: true, runner });
    expect(seen).toEqual([
      { moduleId: 'pkg.util', relativePath: 'pkg/util.js', absolutePath: path.join(ROOT, 'pkg', 'util.js'), source: 'x' },
    ]);
    expect(reports).toEqual([{ path: 'pkg/util.js', text: 'ran pkg.util' }]);
  });
});

describe('createRunner', () => {
  it('picks the runner for the execution mode', () => {
    const repo = repoOf({});
    expect(createRunner(repo, 'in-process', { timeoutMs: 1000 })).toBeInstanceOf(InProcessRunner);
    expect(createRunner(repo, 'subprocess', { timeoutMs: 1000 })).toBeInstanceOf(SubprocessRunner);
  });
});

describe('reportsToEntries', () => {
  it('maps reports to payload entries', () => {
    expect(reportsToEntries([{ path: 'a.js', text: 'out' }])).toEqual([{ name: 'a.js', content: 'out' }]);
  });
});
