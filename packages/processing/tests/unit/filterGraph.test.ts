import { describe, expect, test } from 'vitest';
import { InvalidSpecError } from '@eac-fisheye/core';

import {
  ENGINE_GLOBAL_ARGS,
  buildMaskingChain,
  buildProjectionChain,
  describeCommand,
  renderFilterGraph,
  toEngineArgs,
} from '../../src/filterGraph.js';
import { generateMask } from '../../src/mask.js';
import { ENCODING_PROFILES, resolveEncodingProfile } from '../../src/profiles.js';
import { LRV_MATCH_PROJECTION, createProjectionSpec } from '../../src/projection.js';

const PROJECTION_GRAPH = [
  '[0:v]v360=eac:e:ih_fov=360:iv_fov=180,scale=3840x1920,split=2[equirect_left][equirect_right]',
  '[equirect_left]v360=e:fisheye:ih_fov=360:iv_fov=180:h_fov=190:v_fov=190:w=704:h=704:yaw=-90[left_eye]',
  '[equirect_right]v360=e:fisheye:ih_fov=360:iv_fov=180:h_fov=190:v_fov=190:w=704:h=704:yaw=90[right_eye]',
  '[left_eye][right_eye]hstack=inputs=2[dual_fisheye]',
].join(';');

describe('buildProjectionChain', () => {
  const command = buildProjectionChain(LRV_MATCH_PROJECTION, ENCODING_PROFILES.balanced, {
    input: 'GS010123.360',
    output: 'GS010123_fisheye.mp4',
  });

  test('renders the EAC to dual-fisheye graph', () => {
    expect(command.stages.map((stage) => stage.name)).toEqual([
      'equirect',
      'left_eye',
      'right_eye',
      'dual_fisheye',
    ]);
    expect(renderFilterGraph(command.stages)).toBe(PROJECTION_GRAPH);
    expect(command.expectedResolution).toEqual({ width: 1408, height: 704 });
  });

  test('renders the full argument list', () => {
    expect(toEngineArgs(command)).toEqual([
      ...ENGINE_GLOBAL_ARGS,
      '-i', 'GS010123.360',
      '-filter_complex', PROJECTION_GRAPH,
      '-map', '[dual_fisheye]',
      '-map', '0:a?',
      '-c:v', 'libx264',
      '-preset', 'medium',
      '-crf', '23',
      '-pix_fmt', 'yuv420p',
      '-c:a', 'copy',
      '-movflags', '+faststart',
      'GS010123_fisheye.mp4',
    ]);
  });

  test('truncates the input when a duration limit is set', () => {
    const limited = buildProjectionChain(LRV_MATCH_PROJECTION, ENCODING_PROFILES.fast, {
      input: 'in.360',
      output: 'out.mp4',
      durationLimitSeconds: 30,
    });
    const args = toEngineArgs(limited);

    expect(args.slice(ENGINE_GLOBAL_ARGS.length, ENGINE_GLOBAL_ARGS.length + 4)).toEqual([
      '-t', '30', '-i', 'in.360',
    ]);
    expect(args).toContain('ultrafast');
  });

  test('follows custom geometry', () => {
    const spec = createProjectionSpec({
      outputResolution: { width: 2048, height: 1024 },
      yaw: { left: -80, right: 100 },
    });
    const custom = buildProjectionChain(spec, ENCODING_PROFILES.balanced, { input: 'a.360', output: 'b.mp4' });

    expect(custom.stages[1]?.filters).toEqual([
      'v360=e:fisheye:ih_fov=360:iv_fov=180:h_fov=190:v_fov=190:w=1024:h=1024:yaw=-80',
    ]);
    expect(custom.expectedResolution).toEqual({ width: 2048, height: 1024 });
  });

  test('rejects a non-positive duration limit', () => {
    expect(() =>
      buildProjectionChain(LRV_MATCH_PROJECTION, ENCODING_PROFILES.balanced, {
        input: 'in.360',
        output: 'out.mp4',
        durationLimitSeconds: 0,
      })
    ).toThrow(InvalidSpecError);
  });

  test('rejects an invalid profile before rendering', () => {
    expect(() =>
      buildProjectionChain(
        LRV_MATCH_PROJECTION,
        { name: 'custom', preset: 'medium', crf: 60 },
        { input: 'in.360', output: 'out.mp4' }
      )
    ).toThrow(InvalidSpecError);
  });
});

describe('buildMaskingChain', () => {
  const mask = generateMask(1408, 704);

  test('composites the alpha mask over black at the source rate', () => {
    const command = buildMaskingChain(mask, ENCODING_PROFILES.quality, {
      input: 'dual.mp4',
      output: 'dual_masked.mp4',
      maskPath: '/tmp/mask.png',
      frameRate: '30000/1001',
    });

    expect(renderFilterGraph(command.stages)).toBe(
      '[1:v]format=gray[mask];' +
        '[0:v][mask]alphamerge[masked];' +
        'color=black:size=1408x704:rate=30000/1001[bg];' +
        '[bg][masked]overlay=0:0:format=auto:shortest=1,format=yuv420p[final]'
    );
    expect(command.expectedResolution).toEqual({ width: 1408, height: 704 });
  });

  test('takes the video first and the mask second', () => {
    const command = buildMaskingChain(mask, resolveEncodingProfile({ crf: 20 }), {
      input: 'dual.mp4',
      output: 'dual_masked.mp4',
      maskPath: '/tmp/mask.png',
      durationLimitSeconds: 5,
    });
    const args = toEngineArgs(command);
    const start = ENGINE_GLOBAL_ARGS.length;

    expect(args.slice(start, start + 6)).toEqual(['-t', '5', '-i', 'dual.mp4', '-i', '/tmp/mask.png']);
    expect(args.slice(start + 8)).toEqual([
      '-map', '[final]',
      '-map', '0:a?',
      '-c:v', 'libx264',
      '-preset', 'medium',
      '-crf', '20',
      '-pix_fmt', 'yuv420p',
      '-c:a', 'copy',
      '-movflags', '+faststart',
      'dual_masked.mp4',
    ]);
  });

  test('omits the rate without a probed frame rate', () => {
    const command = buildMaskingChain(mask, ENCODING_PROFILES.balanced, {
      input: 'dual.mp4',
      output: 'out.mp4',
      maskPath: 'mask.png',
    });

    expect(command.stages[2]?.filters).toEqual(['color=black:size=1408x704']);
  });
});

describe('describeCommand', () => {
  test('quotes arguments holding shell-significant characters', () => {
    const command = buildMaskingChain(generateMask(1408, 704), ENCODING_PROFILES.balanced, {
      input: 'my clip.mp4',
      output: 'out.mp4',
      maskPath: 'mask.png',
    });
    const line = describeCommand(command, '/usr/bin/ffmpeg');

    expect(line.startsWith('/usr/bin/ffmpeg -hide_banner -nostdin -nostats -progress pipe:1 -y -i "my clip.mp4" -i mask.png')).toBe(true);
    expect(line).toContain(' -map "[final]" -map "0:a?" ');
    expect(line.endsWith(' -movflags +faststart out.mp4')).toBe(true);
  });
});
