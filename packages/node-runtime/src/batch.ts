// packages/node-runtime/src/batch.ts
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConfigError, FilesystemError } from '../../core/src/errors/index.js';
import type { Logger } from '../../core/src/util/logger.js';
import { decodeContainer, type DecodeOptions, type DecodeResult } from './decodeContainer.js';
import { writeFileAtomic } from './output.js';
import { WorkerPool } from './pool.js';

export interface BatchJob {
  input  : string;
  /** Output base path, without extension */
  output : string;
}

export interface BatchFailure {
  input : string;
  error : Error;
}

export interface BatchSummary {
  total     : number;
  completed : number;
  failed    : BatchFailure[];
  results   : DecodeResult[];
  elapsedMs : number;
}

export interface BatchOptions {
  /** Worker count; 0 means one per CPU */
  threads? : number;
  log      : Logger;
  decoder? : DecodeOptions;
}

/** Non-empty lines of a list file. */
export async function readListFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new FilesystemError(`Unable to read list file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return text
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => line.length > 0);
}

/** Recursively collect regular files ending in `ext`. A missing directory yields nothing. */
export async function findContainers(dir: string, ext = '.ncm'): Promise<string[]> {
  try {
    if (!(await stat(dir)).isDirectory()) return [];
  } catch {
    return [];
  }
  const found: string[] = [];
  const walk = async (d: string): Promise<void> => {
    for (const e of await readdir(d, { withFileTypes: true })) {
      const full = join(d, e.name);
      if (e.isDirectory()) await walk(full);
      else if (e.isFile() && extname(e.name) === ext) found.push(full);
    }
  };
  await walk(dir);
  return found.sort();
}

export function planFromLists(inputs: string[], outputs: string[]): BatchJob[] {
  if (inputs.length === 0 || outputs.length === 0) {
    throw new ConfigError('Input or output file list is empty.');
  }
  if (inputs.length !== outputs.length) {
    throw new ConfigError(
      `Input and output file lists must have the same number of lines (${inputs.length} vs ${outputs.length}).`,
    );
  }
  return inputs.map((input, i) => ({ input, output: outputs[i] }));
}

export function planFromDirectory(files: string[], outputDir: string): BatchJob[] {
  return files.map(input => ({
    input,
    output: join(outputDir, basename(input, extname(input))),
  }));
}

/** Output next to each source: `<dir-of-source>/<stem>`. */
export function planInPlace(files: string[]): BatchJob[] {
  return files.map(input => ({
    input,
    output: join(dirname(input), basename(input, extname(input))),
  }));
}

/**
 * Write the jobs as a pair of list files that `readListFile` and
 * `planFromLists` read back. Inputs are written as absolute paths.
 */
export async function writeListFiles(
  jobs: BatchJob[],
  inputList: string,
  outputList: string,
): Promise<void> {
  const enc = new TextEncoder();
  const lines = (pick: (j: BatchJob) => string) =>
    enc.encode(jobs.map(j => pick(j) + '\n').join(''));

  await writeFileAtomic(inputList, lines(j => resolve(j.input)));
  await writeFileAtomic(outputList, lines(j => j.output));
}

/**
 * Decode every job through a bounded pool. A failing job is logged as a
 * warning and counted; it never stops its siblings.
 */
export async function runBatch(jobs: BatchJob[], opt: BatchOptions): Promise<BatchSummary> {
  const { log } = opt;
  const pool    = new WorkerPool(opt.threads ?? 0);
  const started = performance.now();

  const results: DecodeResult[] = [];
  const failed : BatchFailure[] = [];
  let completed = 0;

  log.log(1, `Processing ${jobs.length} files with ${pool.size} workers`);

  await Promise.all(jobs.map(job => pool.run(async () => {
    const name = basename(job.input);
    const t0   = performance.now();
    log.log(2, `Processing: ${name}`);
    try {
      const res = await decodeContainer(job.input, job.output, opt.decoder);
      results.push(res);
      completed++;
      log.log(1, `Completed: ${name} → ${res.audioPath} (${Math.round(performance.now() - t0)}ms)`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      failed.push({ input: job.input, error });
      log.log(0, `WARN Error processing ${job.input}: [${error.name}] ${error.message}`);
    }
  })));

  return {
    total: jobs.length,
    completed,
    failed,
    results,
    elapsedMs: performance.now() - started,
  };
}
