/**
 * Tests for entry point parsing
 */

import { describe, it, expect } from 'vitest';
import { parseEntryPoint } from '../src/core/entry-point.js';
import { LaunchError } from '../src/core/errors.js';

describe('parseEntryPoint', () => {
  it('should split module and attribute', () => {
    expect(parseEntryPoint('main:app')).toEqual({ module: 'main', attribute: 'app', ref: 'main:app' });
  });

  it('should accept dotted module and attribute paths', () => {
    const entry = parseEntryPoint('service.web.server:container.app');

    expect(entry.module).toBe('service.web.server');
    expect(entry.attribute).toBe('container.app');
    expect(entry.ref).toBe('service.web.server:container.app');
  });

  it('should trim surrounding whitespace', () => {
    expect(parseEntryPoint('  bot:app ').ref).toBe('bot:app');
  });

  it('should reject a reference without a colon', () => {
    expect(() => parseEntryPoint('main')).toThrow('Entry point "main" must be in the form <module>:<attribute>');
  });

  it.each([':app', 'main:', '1main:app', 'main:app-1', 'my-module:app', 'main..web:app', 'main:app:extra'])(
    'should reject malformed reference %j',
    (ref) => {
      expect(() => parseEntryPoint(ref)).toThrow(LaunchError);
    }
  );

  it('should name the bad part', () => {
    expect(() => parseEntryPoint('my-module:app')).toThrow('has an invalid module path "my-module"');
    expect(() => parseEntryPoint('main:app:extra')).toThrow('has an invalid attribute "app:extra"');
  });
});
