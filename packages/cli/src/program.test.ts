import * as path from 'path';
import { createProgram, readPackageVersion } from './program';

describe('program', () => {
  describe('readPackageVersion', () => {
    it('[PG-A1] should read the version from the cli package manifest', () => {
      expect(readPackageVersion()).toBe('1.0.0');
    });

    it('[PG-A2] should throw when the manifest cannot be read', () => {
      const missing = path.join(__dirname, 'no-such-package.json');

      expect(() => readPackageVersion(missing)).toThrow(/ENOENT/);
    });

    it('[PG-A3] should throw when the manifest has no version', () => {
      const schemaPath = path.join(__dirname, '..', '..', 'core', 'src', 'schemas', 'quickpush_config_schema.json');

      expect(() => readPackageVersion(schemaPath)).toThrow(`No version field in ${schemaPath}`);
    });
  });

  describe('createProgram', () => {
    it('[PG-B1] should name the program and report the manifest version', () => {
      const program = createProgram();

      expect(program.name()).toBe('quickpush');
      expect(program.version()).toBe('1.0.0');
    });
  });
});
