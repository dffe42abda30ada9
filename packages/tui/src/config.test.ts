/**
 * Program option tests
 */

import { describe, it, expect } from 'vitest';
import { ProgramOptionsSchema, resolveProgramOptions } from './config.js';
import { ConfigurationError } from './errors.js';

describe('resolveProgramOptions', () => {
  it('should apply defaults', () => {
    expect(resolveProgramOptions()).toEqual({
      title: 'gridloop',
      initialWidth: 800,
      initialHeight: 600,
      fontFamily: 'Monospace',
      fontSize: 12,
      fps: 60,
      channelCapacity: 100
    });
  });

  it('should keep explicit values', () => {
    const options = resolveProgramOptions({ title: ' Timer ', fps: 0, channelCapacity: 4 });
    expect(options.title).toBe('Timer');
    expect(options.fps).toBe(0);
    expect(options.channelCapacity).toBe(4);
  });

  it('should reject a negative fps', () => {
    expect(() => resolveProgramOptions({ fps: -1 })).toThrow(
      'invalid configuration: fps: must be non-negative'
    );
  });

  it('should list every violation', () => {
    try {
      resolveProgramOptions({ initialWidth: 0, initialHeight: 1.5, title: '   ' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION');
        expect(error.issues).toEqual([
          'title: cannot be empty',
          'initialWidth: must be positive',
          'initialHeight: must be an integer'
        ]);
      }
    }
  });

  it('should reject a zero channel capacity', () => {
    expect(() => resolveProgramOptions({ channelCapacity: 0 })).toThrow(ConfigurationError);
  });
});

describe('ProgramOptionsSchema', () => {
  it('should reject values of the wrong type', () => {
    const result = ProgramOptionsSchema.safeParse({ fontSize: 'large' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('must be a number');
    }
  });
});
