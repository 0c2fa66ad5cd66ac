import { createLogger, type LogLevel } from '../../src/utils/logger.js';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

function collect(level: LogLevel, format: 'text' | 'json' = 'text') {
  const lines: string[] = [];
  const logger = createLogger({ level, format, now: fixedNow, write: (line) => { lines.push(line); } });
  return { logger, lines };
}

describe('createLogger', () => {
  it('formats text lines with timestamp, level and metadata', () => {
    const { logger, lines } = collect('debug');
    logger.info('Probe: reading metadata', { videoPath: 'clip.mp4' });
    logger.warn('plain');

    expect(lines).toEqual([
      '[2026-01-02T03:04:05.000Z] [INFO] Probe: reading metadata {"videoPath":"clip.mp4"}',
      '[2026-01-02T03:04:05.000Z] [WARN] plain',
    ]);
  });

  it('drops messages below the configured level', () => {
    const { logger, lines } = collect('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[WARN] w');
    expect(lines[1]).toContain('[ERROR] e');
  });

  it('writes one JSON object per line in json format', () => {
    const { logger, lines } = collect('info', 'json');
    logger.error('Pipeline: failed', { path: 'a.mp4', count: 2 });

    expect(JSON.parse(lines[0] ?? '')).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      level:     'error',
      message:   'Pipeline: failed',
      path:      'a.mp4',
      count:     2,
    });
  });

  it('keeps the name and message of Error values', () => {
    const { logger, lines } = collect('debug', 'json');
    logger.debug('boom', { error: new TypeError('bad input') });

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ error: { name: 'TypeError', message: 'bad input' } });
  });
});
