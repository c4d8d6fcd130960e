import nodeConsole from 'console';
import fs from 'fs';
import path from 'path';
import vm from 'vm';
import { createRequire } from 'module';
import { Writable } from 'stream';
import { ExecutionError, formatTrace } from '../shared/errors.js';
import { ExecutionScope, ProcessExit } from './execution-scope.js';
import type { OutputChannel } from './output-channel.js';
import type { ExecutionRequest, ExecutionRunner } from './types.js';

/** Returns the in-memory source for an absolute path, or undefined to fall back to disk. */
export type SourceLookup = (absolutePath: string) => string | undefined;

interface CommonJsModule {
  id: string;
  filename: string;
  exports: unknown;
  loaded: boolean;
}

type RequireFn = (id: string) => unknown;

const WRAPPER_PARAMS = ['exports', 'require', 'module', '__filename', '__dirname'];
const RESOLVE_SUFFIXES = ['', '.js', '.cjs', '.json'];

/**
 * Runs files as CommonJS modules inside one vm context shared by the whole run. Globals a
 * file defines are visible to the files after it; only printed output is kept apart.
 *
 * The context has a single console and `process.stdout`, both writing to the channel of
 * the file currently executing. A module cached by an earlier file therefore prints into
 * whichever file calls it. A file is finished once the timers it queued
 * have run; its unhandled rejections count as its failure.
 */
export class InProcessRunner implements ExecutionRunner {
  private readonly context: vm.Context;
  private readonly contextPromise: PromiseConstructor;
  private readonly cache = new Map<string, CommonJsModule>();
  private readonly loaded = new Set<string>();
  private readonly stdout: Writable;
  private scope: ExecutionScope | undefined;

  constructor(private readonly lookup: SourceLookup = () => undefined) {
    this.stdout = new Writable({
      decodeStrings: false,
      write: (chunk: unknown, _encoding, callback) => {
        this.scope?.channel.write(typeof chunk === 'string' ? chunk : String(chunk));
        callback();
      },
    });
    const sharedConsole = new nodeConsole.Console({ stdout: this.stdout, stderr: process.stderr });

    this.context = vm.createContext({
      Buffer,
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder,
      structuredClone,
      console: sharedConsole,
      process: this.contextProcess(),
      setTimeout: (callback: unknown, delay?: unknown, ...args: unknown[]) =>
        this.scope?.setTimeout(callback, delay, args),
      setInterval: (callback: unknown, delay?: unknown, ...args: unknown[]) =>
        this.scope?.setInterval(callback, delay, args),
      setImmediate: (callback: unknown, ...args: unknown[]) => this.scope?.setImmediate(callback, args),
      clearTimeout: (handle: unknown) => this.scope?.clear(handle),
      clearInterval: (handle: unknown) => this.scope?.clear(handle),
      clearImmediate: (handle: unknown) => this.scope?.clear(handle),
      queueMicrotask: (callback: unknown) => this.scope?.queueMicrotask(callback),
    });
    vm.runInContext('globalThis.global = globalThis;', this.context);
    this.contextPromise = vm.runInContext('Promise', this.context);
  }

  async execute(request: ExecutionRequest, channel: OutputChannel): Promise<void> {
    const scope = new ExecutionScope(channel, this.contextPromise);
    this.scope = scope;
    scope.trackPromises();
    try {
      this.runModule(request.absolutePath, request.source, request.moduleId);
      await scope.settle();
    } catch (err) {
      scope.fail(err);
    } finally {
      scope.close();
      this.scope = undefined;
    }

    const failure = scope.failure();
    if (failure) {
      throw new ExecutionError(`${request.relativePath} failed`, this.trimTrace(formatTrace(failure.error)), {
        moduleId: request.moduleId,
      });
    }
  }

  private contextProcess(): NodeJS.Process {
    return Object.create(process, {
      stdout: { value: this.stdout, enumerable: true },
      exit: {
        value: (code?: number) => {
          throw new ProcessExit(code ?? 0);
        },
      },
    });
  }

  // Frames from the first one outside the executed files onward belong to the runner.
  private trimTrace(trace: string): string {
    const lines = trace.split('\n');
    const cut = lines.findIndex(line => /^\s+at /.test(line) && !this.isExecutedFrame(line));
    return cut === -1 ? trace : `${lines.slice(0, cut).join('\n')}\n`;
  }

  private isExecutedFrame(line: string): boolean {
    for (const filename of this.loaded) {
      if (line.includes(filename)) return true;
    }
    return false;
  }

  private runModule(filename: string, source: string, id: string): CommonJsModule {
    const module: CommonJsModule = { id, filename, exports: {}, loaded: false };
    this.cache.set(filename, module);
    this.loaded.add(filename);
    try {
      const wrapper = vm.compileFunction(source, WRAPPER_PARAMS, {
        filename,
        parsingContext: this.context,
      });
      wrapper.call(module.exports, module.exports, this.requireFrom(filename), module, filename, path.dirname(filename));
    } catch (err) {
      this.cache.delete(filename);
      throw err;
    }
    module.loaded = true;
    return module;
  }

  private requireFrom(filename: string): RequireFn {
    const hostRequire = createRequire(filename);
    return (id: string) => {
      if (!id.startsWith('.') && !path.isAbsolute(id)) return hostRequire(id);

      const resolved = this.resolve(path.resolve(path.dirname(filename), id));
      if (!resolved) {
        throw new Error(`Cannot find module '${id}' from '${filename}'`);
      }
      const cached = this.cache.get(resolved.filename);
      if (cached) return cached.exports;

      if (path.extname(resolved.filename) === '.json') {
        const module: CommonJsModule = {
          id: resolved.filename,
          filename: resolved.filename,
          exports: JSON.parse(resolved.source),
          loaded: true,
        };
        this.cache.set(resolved.filename, module);
        return module.exports;
      }
      return this.runModule(resolved.filename, resolved.source, resolved.filename).exports;
    };
  }

  private resolve(base: string): { filename: string; source: string } | undefined {
    const candidates = [...RESOLVE_SUFFIXES.map(suffix => base + suffix), path.join(base, 'index.js')];
    for (const candidate of candidates) {
      const inMemory = this.lookup(candidate);
      if (inMemory !== undefined) return { filename: candidate, source: inMemory };
      if (isFile(candidate)) return { filename: candidate, source: fs.readFileSync(candidate, 'utf-8') };
    }
    return undefined;
  }
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
