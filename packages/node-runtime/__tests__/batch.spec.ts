import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { promises as fs } from 'node:fs';
import {
  findContainers,
  planFromDirectory,
  planFromLists,
  planInPlace,
  readListFile,
  runBatch,
  writeListFiles,
} from '../src/batch.js';
import { ConfigError, FilesystemError } from '../../core/src/errors/index.js';
import { createLogger } from '../../core/src/util/logger.js';
import { buildContainer, sampleAudio } from '../../core/__tests__/fixture.js';

describe('batch planning', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'ncmkit-batch-'));
  });

  afterEach(() => fs.rm(dir, { recursive: true, force: true }));

  it('reads list files, dropping blank lines and CR endings', async () => {
    const p = join(dir, 'list.txt');
    await fs.writeFile(p, 'a.ncm\r\n\r\nsub/b.ncm\n\nc.ncm');
    expect(await readListFile(p)).toEqual(['a.ncm', 'sub/b.ncm', 'c.ncm']);
  });

  it('reports an unreadable list file as FilesystemError', async () => {
    await expect(readListFile(join(dir, 'missing.txt'))).rejects.toThrow(FilesystemError);
  });

  it('pairs input and output lines', () => {
    expect(planFromLists(['a.ncm', 'b.ncm'], ['out/a', 'out/b'])).toEqual([
      { input: 'a.ncm', output: 'out/a' },
      { input: 'b.ncm', output: 'out/b' },
    ]);
  });

  it('rejects empty or mismatched lists', () => {
    expect(() => planFromLists([], [])).toThrow(ConfigError);
    expect(() => planFromLists(['a.ncm'], [])).toThrow(ConfigError);
    expect(() => planFromLists(['a.ncm', 'b.ncm'], ['out/a']))
      .toThrow('Input and output file lists must have the same number of lines (2 vs 1).');
  });

  it('maps scanned files to <outputDir>/<stem>', () => {
    expect(planFromDirectory([join('in', 'x.y.ncm'), join('in', 'sub', 'z.ncm')], 'out')).toEqual([
      { input: join('in', 'x.y.ncm'), output: join('out', 'x.y') },
      { input: join('in', 'sub', 'z.ncm'), output: join('out', 'z') },
    ]);
  });

  it('maps files to <dir-of-source>/<stem> in place', () => {
    expect(planInPlace([join('in', 'x.y.ncm'), join('in', 'sub', 'z.ncm')])).toEqual([
      { input: join('in', 'x.y.ncm'), output: join('in', 'x.y') },
      { input: join('in', 'sub', 'z.ncm'), output: join('in', 'sub', 'z') },
    ]);
  });

  it('writes list files that plan back to the same jobs', async () => {
    const jobs = planInPlace([join(dir, 'a.ncm'), join(dir, 'sub', 'b.ncm')]);
    const inList  = join(dir, 'lists', 'in.txt');
    const outList = join(dir, 'lists', 'out.txt');

    await writeListFiles(jobs, inList, outList);

    expect(await fs.readFile(inList, 'utf8')).toBe(`${join(dir, 'a.ncm')}\n${join(dir, 'sub', 'b.ncm')}\n`);
    expect(planFromLists(await readListFile(inList), await readListFile(outList))).toEqual(jobs);
  });

  it('finds containers recursively and ignores other files', async () => {
    await fs.mkdir(join(dir, 'sub', 'deeper'), { recursive: true });
    await fs.writeFile(join(dir, 'b.ncm'), '');
    await fs.writeFile(join(dir, 'a.mp3'), '');
    await fs.writeFile(join(dir, 'sub', 'deeper', 'c.ncm'), '');
    await fs.mkdir(join(dir, 'dir.ncm'));

    expect(await findContainers(dir)).toEqual([
      join(dir, 'b.ncm'),
      join(dir, 'sub', 'deeper', 'c.ncm'),
    ]);
  });

  it('treats a missing scan directory as empty', async () => {
    expect(await findContainers(join(dir, 'nowhere'))).toEqual([]);
  });
});

describe('runBatch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'ncmkit-batch-'));
  });

  afterEach(() => fs.rm(dir, { recursive: true, force: true }));

  it('keeps going after a failure and counts both outcomes', async () => {
    const good = join(dir, 'good.ncm');
    const bad  = join(dir, 'bad.ncm');
    await fs.writeFile(good, buildContainer({ audio: sampleAudio(500) }).bytes);
    await fs.writeFile(bad, 'not a container');

    const lines: string[] = [];
    const log = createLogger(2, m => { lines.push(m); });

    const summary = await runBatch(
      [
        { input: bad,  output: join(dir, 'out', 'bad') },
        { input: good, output: join(dir, 'out', 'good') },
      ],
      { threads: 2, log },
    );

    expect(summary.total).toBe(2);
    expect(summary.completed).toBe(1);
    expect(summary.failed).toHaveLength(1);
    expect(summary.failed[0].input).toBe(bad);
    expect(summary.failed[0].error.name).toBe('TruncatedInputError');
    expect(summary.results.map(r => r.audioPath)).toEqual([join(dir, 'out', 'good.mp3')]);

    expect(lines[0]).toBe('1| Processing 2 files with 2 workers');
    expect(lines).toContain('2| Processing: good.ncm');
    expect(lines.filter(l => l.startsWith('0| WARN Error processing '))).toHaveLength(1);
    expect(lines.some(l => /^1\| Completed: good\.ncm → .*good\.mp3 \(\d+ms\)$/.test(l))).toBe(true);

    expect(await fs.readdir(join(dir, 'out'))).toEqual(['good.mp3']);
  });

  it('forwards decoder options to every job', async () => {
    const p = join(dir, 'plain.ncm');
    await fs.writeFile(p, buildContainer({ metadata: null, audio: sampleAudio(10) }).bytes);

    const summary = await runBatch([{ input: p, output: join(dir, 'plain') }], {
      threads: 1,
      log: createLogger(0, () => {}),
      decoder: { defaultFormat: 'flac' },
    });

    expect(summary.completed).toBe(1);
    expect(summary.results[0].audioPath).toBe(join(dir, 'plain.flac'));
  });
});
