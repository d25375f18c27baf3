import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, mergeConfig, resolveConfig, validateConfig } from '../config/index.js';
import type { Publisher } from '../model/index.js';

const publisher: Publisher = {
  category: 'vendor',
  name: 'Test Publisher',
  namespace: 'https://example.com',
};

describe('Configuration', () => {
  describe('resolveConfig', () => {
    it('fills every option from the defaults', () => {
      expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('keeps falsy overrides', () => {
      const config = resolveConfig({ indent: 0, strict: false });
      expect(config.indent).toBe(0);
      expect(config.strict).toBe(false);
      expect(config.verbose).toBe(false);
    });

    it('carries the interop options through', () => {
      expect(resolveConfig({ interop: { publisher, lang: 'de' } }).interop).toEqual({ publisher, lang: 'de' });
    });

    it('throws ConfigError listing every problem', () => {
      let error: unknown;
      try {
        resolveConfig({ indent: 50, interop: { lang: 'english language' } });
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.errors).toEqual([
        'indent must be an integer between 0 and 10',
        'interop.lang is not a language tag: english language',
      ]);
      expect(error instanceof Error && error.message).toBe(
        'Invalid configuration: indent must be an integer between 0 and 10; interop.lang is not a language tag: english language'
      );
    });
  });

  describe('mergeConfig', () => {
    it('lets overrides win and ignores undefined values', () => {
      const merged = mergeConfig(
        { strict: true, indent: 4, interop: { lang: 'en' } },
        { strict: undefined, verbose: true, interop: { publisher } }
      );

      expect(merged).toEqual({
        strict: true,
        verbose: true,
        indent: 4,
        interop: { lang: 'en', publisher },
      });
    });

    it('does not modify its inputs', () => {
      const base = { interop: { lang: 'en' } };
      mergeConfig(base, { interop: { lang: 'de' } });
      expect(base.interop.lang).toBe('en');
    });
  });

  describe('validateConfig', () => {
    it('accepts a complete configuration', () => {
      expect(validateConfig({ strict: true, indent: 2, interop: { publisher, lang: 'en-US' } })).toEqual({
        valid: true,
        errors: [],
      });
    });

    it.each([11, -1, 1.5])('rejects indent %d', indent => {
      expect(validateConfig({ indent })).toEqual({
        valid: false,
        errors: ['indent must be an integer between 0 and 10'],
      });
    });

    it('rejects an incomplete publisher', () => {
      const result = validateConfig({ interop: { publisher: { ...publisher, name: ' ', namespace: 'not a url' } } });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'interop.publisher.name must not be empty',
        'interop.publisher.namespace is not a URL: not a url',
      ]);
    });

    it('rejects an empty namespace', () => {
      const result = validateConfig({ interop: { publisher: { ...publisher, namespace: '' } } });
      expect(result.errors).toEqual(['interop.publisher.namespace must not be empty']);
    });

    it('rejects a malformed language tag', () => {
      expect(validateConfig({ interop: { lang: 'english language' } }).errors).toEqual([
        'interop.lang is not a language tag: english language',
      ]);
    });
  });
});
