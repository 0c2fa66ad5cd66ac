import { formatMetadata, parseFrameRate, parseProbeOutput, probeVideo } from '../../src/media/probe.js';
import type { ToolRunner } from '../../src/media/process.js';
import { ExternalToolError, UnsupportedFormatError } from '../../src/utils/errors.js';
import { silentLogger } from '../../src/utils/logger.js';
import { TEN_SECOND_CLIP, createFakeRunner } from '../helpers/fake-tools.js';

const MP4_OUTPUT = JSON.stringify({
  streams: [{
    codec_name:     'h264',
    width:          1920,
    height:         1080,
    r_frame_rate:   '30/1',
    avg_frame_rate: '30/1',
    duration:       '10.000000',
    nb_frames:      '300',
    bit_rate:       '2500000',
  }],
  format: { duration: '10.010000', bit_rate: '2600000' },
});

describe('parseFrameRate', () => {
  it('parses ffprobe rationals', () => {
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('25/1')).toBe(25);
  });

  it('accepts a bare number', () => {
    expect(parseFrameRate('24')).toBe(24);
  });

  it('returns 0 for undefined, 0/0 and garbage', () => {
    expect(parseFrameRate(undefined)).toBe(0);
    expect(parseFrameRate('0/0')).toBe(0);
    expect(parseFrameRate('n/a')).toBe(0);
  });
});

describe('parseProbeOutput', () => {
  it('maps stream fields onto a video handle', () => {
    expect(parseProbeOutput('/videos/clip.mp4', MP4_OUTPUT)).toEqual({
      path:        '/videos/clip.mp4',
      duration:    10,
      frameRate:   30,
      frameCount:  300,
      width:       1920,
      height:      1080,
      codec:       'h264',
      bitrateKbps: 2500,
    });
  });

  it('falls back to container duration, r_frame_rate and format bit rate', () => {
    const output = JSON.stringify({
      streams: [{ codec_name: 'vp9', width: 640, height: 360, r_frame_rate: '25/1', avg_frame_rate: '0/0' }],
      format:  { duration: '4.000000', bit_rate: '800123' },
    });
    expect(parseProbeOutput('clip.webm', output)).toEqual({
      path:        'clip.webm',
      duration:    4,
      frameRate:   25,
      frameCount:  100,
      width:       640,
      height:      360,
      codec:       'vp9',
      bitrateKbps: 800,
    });
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseProbeOutput('notes.txt', 'not json')).toThrow(UnsupportedFormatError);
  });

  it('rejects output without a video stream', () => {
    expect(() => parseProbeOutput('song.mp3', JSON.stringify({ streams: [] })))
      .toThrow('No video stream found in song.mp3');
    expect(() => parseProbeOutput('song.mp3', '{}')).toThrow(UnsupportedFormatError);
  });

  it('rejects a stream without a frame rate', () => {
    const output = JSON.stringify({ streams: [{ duration: '3.0', r_frame_rate: '0/0', avg_frame_rate: '0/0' }] });
    expect(() => parseProbeOutput('still.mp4', output)).toThrow('Could not determine frame rate of still.mp4');
  });

  it('rejects a stream without a duration', () => {
    const output = JSON.stringify({ streams: [{ avg_frame_rate: '30/1' }] });
    expect(() => parseProbeOutput('live.mp4', output)).toThrow('Could not determine duration of live.mp4');
  });
});

describe('probeVideo', () => {
  it('runs ffprobe with JSON output on the given file', async () => {
    const { runner, calls } = createFakeRunner({ '/in/clip.mp4': TEN_SECOND_CLIP });
    const handle = await probeVideo('/in/clip.mp4', { runner, logger: silentLogger });

    expect(handle.frameCount).toBe(300);
    expect(handle.frameRate).toBe(30);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.binary).toBe('ffprobe');
    expect(calls[0]?.args).toEqual([
      '-v', 'error',
      '-select_streams', 'v:0',
      '-show_entries',
      'stream=width,height,codec_name,r_frame_rate,avg_frame_rate,duration,nb_frames,bit_rate:format=duration,bit_rate',
      '-of', 'json',
      '/in/clip.mp4',
    ]);
  });

  it('uses the configured ffprobe binary', async () => {
    const runner = vi.fn<ToolRunner>(async () => ({ stdout: MP4_OUTPUT, stderr: '' }));
    await probeVideo('clip.mp4', { runner, logger: silentLogger, ffprobePath: '/opt/ffmpeg/bin/ffprobe' });
    expect(runner).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffprobe', expect.any(Array));
  });

  it('propagates tool failures', async () => {
    const { runner } = createFakeRunner({ 'broken.mp4': { ...TEN_SECOND_CLIP, corrupt: true } });
    await expect(probeVideo('broken.mp4', { runner, logger: silentLogger })).rejects.toBeInstanceOf(ExternalToolError);
  });

  it('wraps unexpected runner errors as tool errors', async () => {
    const runner: ToolRunner = async () => { throw new Error('spawn EACCES'); };
    await expect(probeVideo('clip.mp4', { runner, logger: silentLogger }))
      .rejects.toThrow('ffprobe probeVideo failed: spawn EACCES');
  });
});

describe('formatMetadata', () => {
  it('lists the probed fields', () => {
    const handle = parseProbeOutput('/videos/clip.mp4', MP4_OUTPUT);
    expect(formatMetadata(handle)).toEqual([
      'Codec: h264',
      'Resolution: 1920x1080',
      'Avg Fps: 30',
      'Duration: 10',
      'Total Frames: 300',
      'Bitrate: 2500 kbps',
    ]);
  });

  it('rounds fractional frame rates', () => {
    const handle = { ...parseProbeOutput('a.mp4', MP4_OUTPUT), frameRate: 30000 / 1001 };
    expect(formatMetadata(handle)[2]).toBe('Avg Fps: 29.97');
  });
});
