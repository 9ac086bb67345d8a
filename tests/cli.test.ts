/**
 * CLI Option Tests
 */

import { jest } from '@jest/globals';
import { buildProgram } from '../src/index.js';

jest.mock('../src/middleware/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  initializeLogger: jest.fn(),
}));

function parse(args: string[]): Record<string, unknown> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  program.parse(args, { from: 'user' });
  return program.opts();
}

describe('buildProgram', () => {
  it('should default to applying changes with unlocking and artwork on', () => {
    expect(parse([])).toEqual({
      dryRun: false,
      debug: false,
      logging: true,
      unlock: true,
      art: true,
      alwaysUpdateArt: false,
    });
  });

  it('should map every flag', () => {
    expect(
      parse([
        '--scan-path',
        '/media/tv',
        '--dry-run',
        '--debug',
        '--no-logging',
        '--no-unlock',
        '--no-art',
        '--always-update-art',
        '--delay',
        '250',
      ])
    ).toEqual({
      scanPath: '/media/tv',
      dryRun: true,
      debug: true,
      logging: false,
      unlock: false,
      art: false,
      alwaysUpdateArt: true,
      delay: 250,
    });
  });

  it('should reject a delay that is not a whole number of milliseconds', () => {
    expect(() => parse(['--delay', 'soon'])).toThrow('Delay must be a non-negative integer (milliseconds).');
    expect(() => parse(['--delay', '1.5'])).toThrow('Delay must be a non-negative integer (milliseconds).');
  });
});
