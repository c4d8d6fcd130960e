import { formatTrace } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { toModuleId } from '../repo/paths.js';
import type { Repository } from '../repo/repository.js';
import { InProcessRunner } from './in-process-runner.js';
import type { SourceLookup } from './in-process-runner.js';
import { withOutputChannel } from './output-channel.js';
import { SubprocessRunner } from './subprocess-runner.js';
import type { DiagnosticReport, ExecutionMode, ExecutionRunner } from './types.js';

export interface RunAllOptions {
  withOutputs?: boolean;
  withErrors?: boolean;
  runner?: ExecutionRunner;
}

/**
 * Executes every kept file of the repository in stored order and collects what it printed
 * and how it failed. A failing file is recorded and the run moves on; nothing it raises
 * propagates. Returns null when no file produced anything worth reporting.
 */
export async function runAll(repo: Repository, options: RunAllOptions = {}): Promise<DiagnosticReport[] | null> {
  const withOutputs = options.withOutputs ?? false;
  const withErrors = options.withErrors ?? true;
  const runner = options.runner ?? new InProcessRunner(sourceLookup(repo));
  const reports: DiagnosticReport[] = [];

  for (const record of repo.records()) {
    if (record.content.kind !== 'keep') continue;
    const request = {
      moduleId: toModuleId(record.relativePath),
      relativePath: record.relativePath,
      absolutePath: repo.absolutePath(record.relativePath),
      source: record.content.text,
    };

    const text = await withOutputChannel(async channel => {
      logger.debug({ moduleId: request.moduleId }, 'Executing file');
      try {
        await runner.execute(request, channel);
        const output = channel.text();
        return output && withOutputs ? output : '';
      } catch (err) {
        const trace = formatTrace(err);
        logger.warn({ path: record.relativePath, error: trace.split('\n')[0] }, 'File execution failed');
        return withErrors ? `STDOUT:\n${channel.text()}${trace}` : '';
      }
    });

    if (text) reports.push({ path: record.relativePath, text });
  }

  return reports.length > 0 ? reports : null;
}

export function createRunner(
  repo: Repository,
  mode: ExecutionMode,
  options: { timeoutMs: number; nodePath?: string },
): ExecutionRunner {
  return mode === 'subprocess' ? new SubprocessRunner(options) : new InProcessRunner(sourceLookup(repo));
}

export function sourceLookup(repo: Repository): SourceLookup {
  const byAbsolutePath = new Map<string, string>();
  for (const record of repo.records()) {
    if (record.content.kind === 'keep') byAbsolutePath.set(repo.absolutePath(record.relativePath), record.content.text);
  }
  return absolutePath => byAbsolutePath.get(absolutePath);
}

export function reportsToEntries(reports: readonly DiagnosticReport[]): Array<{ name: string; content: string }> {
  return reports.map(report => ({ name: report.path, content: report.text }));
}
