#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { stdout, stderr, exit as processExit } from 'node:process';
import { NcmDecoder } from '../../core/src/decoder/ContainerDecoder.js';
import { trackInfo } from '../../core/src/container/metadata.js';
import { createLogger, toVerbosity } from '../../core/src/util/logger.js';
import { FileByteSource } from './FileByteSource.js';
import type { DecodeOptions } from './decodeContainer.js';
import {
  findContainers,
  planFromDirectory,
  planFromLists,
  planInPlace,
  readListFile,
  runBatch,
  writeListFiles,
  type BatchJob,
} from './batch.js';

const PKG_VERSION = '0.1.0'; // sync with root package.json

interface GlobalOptions {
  strict         : boolean;
  defaultFormat? : string;
  verbose        : number;
}

interface DumpOptions {
  threads    : number;
  input?     : string;
  output     : string;
  dir        : string;
  showtime   : boolean;
  inPlace    : boolean;
  embedCover : boolean;
}

interface ListsOptions {
  output?  : string;
  inList   : string;
  outList  : string;
}

function reportFatal(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', reportFatal);
process.on('unhandledRejection', reportFatal);

const program = new Command();

program
  .name('ncmkit')
  .version(PKG_VERSION)
  .description('Recover audio, cover art and metadata from NCM containers')

  .addOption(
    new Option('--strict', 'reject files whose header magic is not CTENFDAM')
      .default(false)
  )

  .addOption(
    new Option('--default-format <ext>', 'extension to use when a file carries no metadata')
      .argParser((v) => {
        if (!/^[A-Za-z0-9]+$/.test(v)) throw new Error('Default format must be alphanumeric, e.g. mp3');
        return v.toLowerCase();
      })
  )

  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_: string, previous: number) => previous + 1)
  );

function decoderOptions(): DecodeOptions {
  const g = program.opts<GlobalOptions>();
  return { strictHeader: g.strict, defaultFormat: g.defaultFormat };
}

/* ------------------------------------------------------------------ */
/*  dump (default): batch lists or directory scan                      */
/* ------------------------------------------------------------------ */
program
  .command('dump', { isDefault: true })
  .description('Decode containers listed in -i/-o, or every .ncm file under --dir')
  .addOption(
    new Option('-t, --threads <n>', 'max concurrent decodes (0 = one per CPU)')
      .argParser((v) => {
        const n = Number(v);
        if (!Number.isInteger(n) || n < 0) {
          throw new Error('Thread count must be a non-negative integer');
        }
        return n;
      })
      .default(0, 'CPU count')
  )
  .option('-i, --input <file>', 'text file listing input containers, one per line')
  .option('-o, --output <path>', 'list of output bases (with -i) or output directory', 'unlocked')
  .option('-d, --dir <dir>', 'directory scanned for .ncm files when -i is absent', '.')
  .option('-s, --showtime', 'print the total elapsed time', false)
  .addOption(
    new Option('--in-place', 'write each output next to its source (scan mode)')
      .default(false)
      .conflicts('input')
  )
  .option('--embed-cover', 'embed the cover into MP3/FLAC tags instead of writing a .jpg', false)
  .action(async (opts: DumpOptions) => {
    const g   = program.opts<GlobalOptions>();
    const log = createLogger(toVerbosity(1 + g.verbose));

    let jobs: BatchJob[];
    if (opts.input) {
      log.log(2, `Batch mode: ${opts.input} → ${opts.output}`);
      jobs = planFromLists(await readListFile(opts.input), await readListFile(opts.output));
    } else {
      log.log(2, `Scan mode: ${opts.dir} → ${opts.output}`);
      const files = await findContainers(opts.dir);
      if (files.length === 0) {
        log.log(0, `WARN No .ncm files found in ${opts.dir}`);
        return;
      }
      jobs = opts.inPlace ? planInPlace(files) : planFromDirectory(files, opts.output);
    }

    const summary = await runBatch(jobs, {
      threads: opts.threads,
      log,
      decoder: { ...decoderOptions(), embedCover: opts.embedCover },
    });

    log.log(1, `Total files processed: ${summary.completed}/${summary.total}`);
    if (summary.failed.length) {
      log.log(0, `WARN ${summary.failed.length} file(s) failed`);
    }
    if (opts.showtime) {
      log.log(1, `Total time elapsed: ${(summary.elapsedMs / 1000).toFixed(3)}s`);
    }
  });

/* ------------------------------------------------------------------ */
/*  lists: generate input/output list files for `dump -i -o`           */
/* ------------------------------------------------------------------ */
program
  .command('lists [dir]')
  .description('Scan a directory and write input/output list files for dump -i/-o')
  .option('-o, --output <dir>', 'output directory for the listed bases (default: beside each source)')
  .option('--in-list <file>', 'input list to write', 'ncm_input.txt')
  .option('--out-list <file>', 'output list to write', 'ncm_output.txt')
  .action(async (dir: string | undefined, opts: ListsOptions) => {
    const g       = program.opts<GlobalOptions>();
    const log     = createLogger(toVerbosity(1 + g.verbose));
    const scanDir = dir ?? '.';

    const files = await findContainers(scanDir);
    if (files.length === 0) {
      log.log(0, `WARN No .ncm files found in ${scanDir}`);
      return;
    }

    const jobs = opts.output ? planFromDirectory(files, opts.output) : planInPlace(files);
    await writeListFiles(jobs, opts.inList, opts.outList);
    log.log(1, `Generated ${opts.inList} and ${opts.outList}`);
    log.log(1, `Found ${files.length} .ncm files.`);
  });

/* ------------------------------------------------------------------ */
/*  info: metadata without writing anything                            */
/* ------------------------------------------------------------------ */
program
  .command('info <src>')
  .description('Print metadata, cover size and payload details of one container as JSON')
  .action(async (src: string) => {
    const fileSrc = await FileByteSource.open(src);
    try {
      const c = await new NcmDecoder(decoderOptions()).open(fileSrc);
      stdout.write(JSON.stringify({
        format    : c.format,
        track     : trackInfo(c.metadata),
        coverBytes: c.cover?.length ?? 0,
        payload   : { offset: c.payloadOffset, length: c.payloadLength },
        metadata  : c.metadata,
      }, null, 2) + '\n');
    } finally {
      await fileSrc.close();
    }
  });

try {
  await program.parseAsync();
} catch (err) {
  reportFatal(err);
}
