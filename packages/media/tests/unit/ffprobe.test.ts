import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { FFProbe } from '../../src/probes/ffprobe.js';

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'eac-fisheye-ffprobe-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

/**
 * Writes an executable node script standing in for ffprobe
 */
async function fakeFFProbe(body: string): Promise<string> {
  const path = join(workDir, 'ffprobe');
  await writeFile(path, `#!${process.execPath}\n${body}\n`);
  await chmod(path, 0o755);
  return path;
}

const STREAMS_JSON = JSON.stringify({
  streams: [{ index: 0, codec_type: 'video', codec_name: 'h264', width: 1408, height: 704 }],
});

describe('FFProbe', () => {
  test('parses the JSON the tool prints', async () => {
    const ffprobe = new FFProbe(await fakeFFProbe(`process.stdout.write(${JSON.stringify(STREAMS_JSON)});`));

    const result = await ffprobe.probe(join(workDir, 'clip.mp4'));

    expect(result.streams).toHaveLength(1);
    expect(result.streams[0]?.width).toBe(1408);
  });

  test('rejects a non-zero exit with the stderr text', async () => {
    const ffprobe = new FFProbe(await fakeFFProbe('process.stderr.write("No such file"); process.exit(1);'));

    await expect(ffprobe.probe('missing.360')).rejects.toThrow('ffprobe failed with code 1: No such file');
  });

  test('stops a slow run when the signal aborts', async () => {
    const ffprobe = new FFProbe(await fakeFFProbe('setTimeout(() => {}, 10000);'));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const started = Date.now();

    await expect(ffprobe.probe('clip.360', { signal: controller.signal })).rejects.toThrow(
      'ffprobe was aborted for clip.360'
    );
    expect(Date.now() - started).toBeLessThan(3000);
  });

  test('stops a slow run once timeoutMs elapses', async () => {
    const ffprobe = new FFProbe(await fakeFFProbe('setTimeout(() => {}, 10000);'));
    const started = Date.now();

    await expect(ffprobe.probe('clip.360', { timeoutMs: 200 })).rejects.toThrow('ffprobe timed out for clip.360');
    expect(Date.now() - started).toBeLessThan(3000);
  });
});
