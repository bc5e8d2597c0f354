import assert from 'node:assert/strict';
import { join } from 'node:path';
import test from 'node:test';

import type { CommandRunner } from '../src/cli/utils/exec.js';
import { buildProbeArgs } from '../src/cli/utils/ffmpeg.js';
import { DEFAULT_TOOLS } from '../src/pipeline/config.js';
import { CancellationError, InputError, ProbeError } from '../src/pipeline/errors.js';
import { inspectVideo } from '../src/pipeline/mediaInspector.js';
import type { StageContext } from '../src/pipeline/types.js';
import { silentLogger } from '../src/runtime/logger.js';
import { createFakeToolchain, type FakeToolchainOptions } from './support/fakeToolchain.js';
import { withWorkspace } from './support/workspace.js';

const media: FakeToolchainOptions['media'] = {
  width: 320,
  height: 240,
  fps: '30000/1001',
  duration: 2,
  frames: 60,
  audio: true,
};

const contextFor = (runner: CommandRunner, signal?: AbortSignal): StageContext => ({
  runner,
  tools: DEFAULT_TOOLS,
  logger: silentLogger,
  signal,
});

test('inspectVideo reads resolution, frame rate and audio presence', async () => {
  await withWorkspace(async ({ input }) => {
    const toolchain = createFakeToolchain({ media });
    const video = await inspectVideo(input, contextFor(toolchain.runner));

    assert.deepEqual(video, {
      path: input,
      width: 320,
      height: 240,
      fps: 30000 / 1001,
      fpsRational: '30000/1001',
      duration: 2,
      hasAudio: true,
      frameCountHint: 60,
    });
    assert.ok(Object.isFrozen(video));
    assert.deepEqual(toolchain.calls, [{ command: 'ffprobe', args: buildProbeArgs(input) }]);
  });
});

test('inspectVideo rejects a missing input before running ffprobe', async () => {
  await withWorkspace(async ({ dir }) => {
    const toolchain = createFakeToolchain({ media });
    const missing = join(dir, 'nope.mp4');
    await assert.rejects(inspectVideo(missing, contextFor(toolchain.runner)), (error: unknown) => {
      assert.ok(error instanceof InputError);
      assert.equal(error.code, 'missing-input');
      assert.equal(error.message, `Input file does not exist: ${missing}`);
      return true;
    });
    assert.deepEqual(toolchain.calls, []);
  });
});

test('inspectVideo rejects a directory', async () => {
  await withWorkspace(async ({ dir }) => {
    const toolchain = createFakeToolchain({ media });
    await assert.rejects(inspectVideo(dir, contextFor(toolchain.runner)), (error: unknown) => {
      assert.ok(error instanceof InputError);
      assert.equal(error.code, 'not-a-file');
      return true;
    });
  });
});

test('an ffprobe failure becomes an unreadable-input error with diagnostics', async () => {
  await withWorkspace(async ({ input }) => {
    const toolchain = createFakeToolchain({ media, probeFails: true });
    await assert.rejects(inspectVideo(input, contextFor(toolchain.runner)), (error: unknown) => {
      assert.ok(error instanceof ProbeError);
      assert.equal(error.stage, 'probe');
      assert.equal(error.code, 'unreadable');
      assert.equal(
        error.message,
        `Could not read ${input}: Command "ffprobe" failed with exit code 1`,
      );
      assert.equal(error.diagnostics, 'Invalid data found when processing input');
      return true;
    });
  });
});

test('inspectVideo reports files without a video stream', async () => {
  await withWorkspace(async ({ input }) => {
    const runner: CommandRunner = async (command, args) => ({
      command,
      args,
      exitCode: 0,
      stdout: Buffer.from(JSON.stringify({ streams: [{ index: 0, codec_type: 'audio' }] })),
      stderr: Buffer.alloc(0),
      durationMs: 1,
    });
    await assert.rejects(inspectVideo(input, contextFor(runner)), (error: unknown) => {
      assert.ok(error instanceof ProbeError);
      assert.equal(error.code, 'no-video-stream');
      assert.equal(error.message, 'No decodable video stream in clip.mp4');
      return true;
    });
  });
});

test('inspectVideo surfaces cancellation as such', async () => {
  await withWorkspace(async ({ input }) => {
    const controller = new AbortController();
    controller.abort();
    const toolchain = createFakeToolchain({ media });
    await assert.rejects(
      inspectVideo(input, contextFor(toolchain.runner, controller.signal)),
      (error: unknown) => {
        assert.ok(error instanceof CancellationError);
        assert.equal(error.stage, 'probe');
        assert.equal(error.message, 'Cancelled during probe');
        return true;
      },
    );
  });
});
