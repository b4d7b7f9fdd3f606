import { describe, it, expect } from 'vitest';
import { Config, DEFAULT_DIRECTORY } from '../src/config.js';
import { Format, getDecoder, type Decoder } from '../src/decoders/index.js';
import { LanguagesErrorCode, ok } from '../src/errors.js';
import { expectErr, expectOk } from './helpers/fixtures.js';

describe('Config', () => {
  describe('default', () => {
    it('should point at the languages directory with no languages and JSON files', () => {
      const config = Config.default();

      expect(config.getDirectory()).toBe('languages');
      expect(DEFAULT_DIRECTORY).toBe('languages');
      expect(config.getLanguages()).toEqual([]);
      expect(config.getFormat()).toBe('json');
    });
  });

  describe('addLanguage', () => {
    it('should keep codes in insertion order, once each', () => {
      const config = Config.default();
      for (const code of ['es', 'en', 'pt-BR', 'zh_Hant']) {
        expectOk(config.addLanguage(code));
      }

      expect(config.getLanguages()).toEqual(['es', 'en', 'pt-BR', 'zh_Hant']);
      expect(config.hasLanguage('pt-BR')).toBe(true);
      expect(config.hasLanguage('pt-br')).toBe(false);
    });

    it('should reject a duplicate code and keep the list unchanged', () => {
      const config = Config.default();
      expectOk(config.addLanguage('en'));

      const error = expectErr(config.addLanguage('en'));

      expect(error.code).toBe(LanguagesErrorCode.DUPLICATE_LANGUAGE);
      expect(error.message).toBe('The language `en` already exists.');
      expect(config.getLanguages()).toEqual(['en']);
    });

    it('should reject an empty code', () => {
      const error = expectErr(Config.default().addLanguage(''));
      expect(error.code).toBe(LanguagesErrorCode.INVALID_LANGUAGE_CODE);
      expect(error.message).toBe('The language code cannot be empty.');
    });

    it.each(['../en', 'en/us', 'en.json', ' en', 'en-', '-en', 'en--us'])(
      'should reject the malformed code %j',
      (code) => {
        const error = expectErr(Config.default().addLanguage(code));
        expect(error.code).toBe(LanguagesErrorCode.INVALID_LANGUAGE_CODE);
        expect(error.details).toEqual({ code });
      }
    );

    it('should return a copy of the language list', () => {
      const config = Config.default();
      expectOk(config.addLanguage('en'));

      expect(config.getLanguages()).not.toBe(config.getLanguages());
    });
  });

  describe('create', () => {
    it('should build a config from a directory and codes', () => {
      const config = expectOk(Config.create('texts', ['en', 'es'], Format.TOML));

      expect(config.getDirectory()).toBe('texts');
      expect(config.getLanguages()).toEqual(['en', 'es']);
      expect(config.getFormat()).toBe('toml');
    });

    it('should fail on the first bad code', () => {
      const error = expectErr(Config.create('texts', ['en', 'en']));
      expect(error.code).toBe(LanguagesErrorCode.DUPLICATE_LANGUAGE);
    });

    it('should reject an empty directory', () => {
      const error = expectErr(Config.create('  ', ['en']));
      expect(error.code).toBe(LanguagesErrorCode.INVALID_DIRECTORY);
    });
  });

  describe('format and decoder', () => {
    it('should switch between built-in decoders', () => {
      const config = Config.default().setFormat(Format.YAML);

      expect(config.getDecoder()).toBe(getDecoder(Format.YAML));
      expect(config.getDecoder().extension).toBe('yaml');
    });

    it('should accept a custom decoder', () => {
      const properties: Decoder = {
        format: 'properties',
        extension: 'properties',
        decode: () => ok(new Map()),
      };

      const config = Config.default().setDecoder(properties);

      expect(config.getFormat()).toBe('properties');
      expect(config.getDecoder()).toBe(properties);
    });

    it('should replace a custom decoder when a built-in format is selected', () => {
      const config = Config.default()
        .setDecoder({ format: 'ini', extension: 'ini', decode: () => ok(new Map()) })
        .setFormat(Format.JSON);

      expect(config.getFormat()).toBe('json');
    });
  });
});
