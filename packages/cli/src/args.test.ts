import { describe, expect, it } from 'vitest';
import { parseArgs } from './args.js';
import { UsageError } from './errors.js';

describe('parseArgs', () => {
  describe('global options', () => {
    it('should read data file locations before the command', () => {
      const parsed = parseArgs([
        '--neofile',
        'neos.csv',
        '--cadfile=cad.json',
        'inspect',
        '--pdes',
        '433',
      ]);

      expect(parsed.global).toEqual({
        neoFile: 'neos.csv',
        approachFile: 'cad.json',
      });
    });

    it('should return help for --help anywhere', () => {
      expect(parseArgs(['--help']).command).toEqual({ command: 'help' });
      expect(parseArgs(['query', '-h']).command).toEqual({ command: 'help' });
    });

    it('should reject a missing or unknown command', () => {
      expect(() => parseArgs([])).toThrow('Missing command');
      expect(() => parseArgs(['interactive'])).toThrow(
        'Unknown command: interactive',
      );
    });

    it('should reject an option without its value', () => {
      expect(() => parseArgs(['--neofile'])).toThrow(
        'Option --neofile requires a value',
      );
    });
  });

  describe('inspect', () => {
    it('should parse a designation lookup', () => {
      expect(parseArgs(['inspect', '--pdes', '433']).command).toEqual({
        command: 'inspect',
        pdes: '433',
        verbose: false,
      });
    });

    it('should parse a verbose name lookup', () => {
      expect(parseArgs(['inspect', '--name', 'Eros', '-v']).command).toEqual({
        command: 'inspect',
        name: 'Eros',
        verbose: true,
      });
    });

    it('should require exactly one of --pdes and --name', () => {
      expect(() => parseArgs(['inspect'])).toThrow(UsageError);
      expect(() =>
        parseArgs(['inspect', '--pdes', '433', '--name', 'Eros']),
      ).toThrow('inspect requires exactly one of --pdes or --name');
    });

    it('should accept values that match Object.prototype keys', () => {
      expect(parseArgs(['inspect', '--name', 'constructor']).command).toEqual({
        command: 'inspect',
        name: 'constructor',
        verbose: false,
      });
      expect(parseArgs(['inspect', '--pdes', 'toString']).command).toEqual({
        command: 'inspect',
        pdes: 'toString',
        verbose: false,
      });
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['inspect', '--limit', '3'])).toThrow(
        'Unknown option for inspect: --limit',
      );
    });
  });

  describe('query', () => {
    it('should parse every criterion', () => {
      const parsed = parseArgs([
        'query',
        '--date',
        '2020-01-01',
        '-s',
        '2019-12-01',
        '--end-date=2020-02-01',
        '--min-distance',
        '0.1',
        '--max-distance',
        '0.2',
        '--min-velocity',
        '5',
        '--max-velocity',
        '25',
        '--min-diameter',
        '0.5',
        '--max-diameter',
        '10',
        '--not-hazardous',
        '-l',
        '5',
        '-o',
        'results.csv',
      ]);

      expect(parsed.command).toEqual({
        command: 'query',
        criteria: {
          date: '2020-01-01',
          startDate: '2019-12-01',
          endDate: '2020-02-01',
          distanceMin: 0.1,
          distanceMax: 0.2,
          velocityMin: 5,
          velocityMax: 25,
          diameterMin: 0.5,
          diameterMax: 10,
          hazardous: false,
        },
        limit: 5,
        outfile: 'results.csv',
      });
    });

    it('should leave hazardous unset without a hazard flag', () => {
      const parsed = parseArgs(['query']);
      expect(parsed.command).toEqual({ command: 'query', criteria: {} });
    });

    it('should parse --hazardous as true', () => {
      const parsed = parseArgs(['query', '--hazardous']);
      expect(parsed.command).toEqual({
        command: 'query',
        criteria: { hazardous: true },
      });
    });

    it('should reject conflicting hazard flags', () => {
      expect(() =>
        parseArgs(['query', '--hazardous', '--not-hazardous']),
      ).toThrow('--hazardous and --not-hazardous cannot be combined');
    });

    it('should reject malformed dates and numbers', () => {
      expect(() => parseArgs(['query', '--date', '2020/01/01'])).toThrow(
        'Option --date expects a date in YYYY-MM-DD format, got "2020/01/01"',
      );
      expect(() => parseArgs(['query', '--min-distance', 'far'])).toThrow(
        'Option --min-distance expects a number, got "far"',
      );
    });

    it('should reject negative or fractional limits', () => {
      expect(() => parseArgs(['query', '--limit', '-2'])).toThrow(
        'Option --limit expects a non-negative integer, got "-2"',
      );
      expect(() => parseArgs(['query', '--limit', '2.5'])).toThrow(UsageError);
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['query', '--fast'])).toThrow(
        'Unknown option for query: --fast',
      );
    });

    it('should report Object.prototype keys as unknown options', () => {
      expect(() => parseArgs(['query', 'constructor', '2020-01-01'])).toThrow(
        'Unknown option for query: constructor',
      );
      expect(() => parseArgs(['query', 'valueOf'])).toThrow(UsageError);
    });
  });
});
