import loadCircuitcProjectConfiguration, {
  fileSystemLoader_EXPOSED_FOR_TESTING,
  parseCircuitcProjectConfiguration,
} from '../configuration';

import { DEFAULT_MAXIMUM_EXPONENT } from 'circuitc-core-optimization';

describe('circuitc-cli/configuration', () => {
  describe('parser', () => {
    it('Parser can parse good configurations', () => {
      expect(parseCircuitcProjectConfiguration('{}')).toEqual({
        input: 'build/typed.json',
        output: 'build/propagated.json',
        maximumExponent: 4294967295,
        verbose: false,
      });

      expect(parseCircuitcProjectConfiguration('{"input": "in.json"}')).toEqual({
        input: 'in.json',
        output: 'build/propagated.json',
        maximumExponent: 4294967295,
        verbose: false,
      });

      expect(
        parseCircuitcProjectConfiguration(`{
          "input": "a.json",
          "output": "b.json",
          "maximumExponent": 0,
          "verbose": true
        }
        `)
      ).toEqual({ input: 'a.json', output: 'b.json', maximumExponent: 0, verbose: true });
    });

    it('Parser defaults the maximum exponent to the propagation default', () => {
      expect(parseCircuitcProjectConfiguration('{}')?.maximumExponent).toBe(
        Number(DEFAULT_MAXIMUM_EXPONENT)
      );
    });

    it('Parser can reject bad configurations', () => {
      expect(parseCircuitcProjectConfiguration('')).toBeNull();
      expect(parseCircuitcProjectConfiguration('null')).toBeNull();
      expect(parseCircuitcProjectConfiguration('[]')).toBeNull();
      expect(parseCircuitcProjectConfiguration('1')).toBeNull();
      expect(parseCircuitcProjectConfiguration('"undefined"')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "input": 3 }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "output": false }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "maximumExponent": "4" }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "maximumExponent": -1 }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "maximumExponent": 1.5 }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "maximumExponent": 1e20 }')).toBeNull();
      expect(parseCircuitcProjectConfiguration('{ "verbose": "yes" }')).toBeNull();
    });
  });

  describe('loader', () => {
    it('When there is no configuration, say so.', () => {
      expect(
        loadCircuitcProjectConfiguration({
          startPath: '/home/user/project',
          pathExistenceTester() {
            return false;
          },
          fileReader() {
            return null;
          },
        })
      ).toBe('NO_CONFIGURATION');
    });

    it('When the configuration file is unreadable, say so.', () => {
      expect(
        loadCircuitcProjectConfiguration({
          startPath: '/home/user/project',
          pathExistenceTester() {
            return true;
          },
          fileReader() {
            return null;
          },
        })
      ).toBe('UNREADABLE_CONFIGURATION_FILE');
    });

    it('When the configuration file is unparsable, say so.', () => {
      expect(
        loadCircuitcProjectConfiguration({
          startPath: '/home/user/project',
          pathExistenceTester() {
            return true;
          },
          fileReader() {
            return 'bad file';
          },
        })
      ).toBe('UNPARSABLE_CONFIGURATION_FILE');
    });

    it('Resolves paths against the directory holding the configuration file.', () => {
      const visited: string[] = [];
      expect(
        loadCircuitcProjectConfiguration({
          startPath: '/home/user/project/src',
          pathExistenceTester(p) {
            visited.push(p);
            return p === '/home/user/circuitc.json';
          },
          fileReader() {
            return '{ "output": "/tmp/out.json", "verbose": true }';
          },
        })
      ).toEqual({
        input: '/home/user/build/typed.json',
        output: '/tmp/out.json',
        maximumExponent: 4294967295,
        verbose: true,
      });
      expect(visited).toEqual([
        '/home/user/project/src/circuitc.json',
        '/home/user/project/circuitc.json',
        '/home/user/circuitc.json',
      ]);
    });

    it('Real filesystem bad start path integration test.', () => {
      expect(
        loadCircuitcProjectConfiguration({
          ...fileSystemLoader_EXPOSED_FOR_TESTING,
          startPath: '/',
        })
      ).toBe('NO_CONFIGURATION');
    });
  });
});
