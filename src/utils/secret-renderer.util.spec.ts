import * as fc from 'fast-check';
import { InvalidOptionsError, UnsupportedFormatError } from '../errors';
import { SecretRendererUtil } from './secret-renderer.util';
import { SecretTreeUtil } from './secret-tree.util';

const render = (
  plain: unknown,
  input: Parameters<typeof SecretRendererUtil.resolveRenderOptions>[0] = {},
) =>
  SecretRendererUtil.render(
    SecretTreeUtil.fromPlain(plain),
    SecretRendererUtil.resolveRenderOptions(input),
  );

describe('SecretRendererUtil', () => {
  describe('resolveRenderOptions', () => {
    it('should fill in defaults', () => {
      expect(SecretRendererUtil.resolveRenderOptions()).toEqual({
        format: 'native',
        maskValues: true,
        maskLength: 12,
        onlyKeys: false,
        onlyPaths: false,
      });
    });

    it('should reject unknown formats', () => {
      expect(() =>
        SecretRendererUtil.resolveRenderOptions({ format: 'xml' }),
      ).toThrow(
        new UnsupportedFormatError('xml'),
      );
      expect(() =>
        SecretRendererUtil.resolveRenderOptions({ format: 'xml' }),
      ).toThrow(
        "unsupported output format 'xml'. Supported formats: native, json, yaml, shell-export",
      );
    });

    it('should reject onlyKeys together with onlyPaths', () => {
      expect(() =>
        SecretRendererUtil.resolveRenderOptions({
          onlyKeys: true,
          onlyPaths: true,
        }),
      ).toThrow(
        new InvalidOptionsError(
          'cannot show only keys and only paths at the same time',
        ),
      );
    });

    it('should reject mask lengths below -1 or with fractions', () => {
      expect(() =>
        SecretRendererUtil.resolveRenderOptions({ maskLength: -2 }),
      ).toThrow('mask length must be an integer >= -1, got -2');
      expect(() =>
        SecretRendererUtil.resolveRenderOptions({ maskLength: 1.5 }),
      ).toThrow(InvalidOptionsError);
    });
  });

  describe('maskValue', () => {
    it('should bound the mask length', () => {
      expect(SecretRendererUtil.maskValue('abc', 12)).toBe('***');
      expect(SecretRendererUtil.maskValue('abcdefghijklmnop', 12)).toBe(
        '************',
      );
      expect(SecretRendererUtil.maskValue(5432, 2)).toBe('**');
      expect(SecretRendererUtil.maskValue(null, 12)).toBe('');
      expect(SecretRendererUtil.maskValue('abc', 0)).toBe('');
    });

    it('should never exceed min(length, maskLength)', () => {
      fc.assert(
        fc.property(fc.string(), fc.nat(40), (value, maskLength) => {
          const masked = SecretRendererUtil.maskValue(value, maskLength);

          expect(masked).toMatch(/^\**$/);
          expect(masked.length).toBe(Math.min([...value].length, maskLength));
        }),
      );
    });

    it('should return the value unchanged for -1', () => {
      expect(SecretRendererUtil.maskValue('test-secret', -1)).toBe(
        'test-secret',
      );
      expect(SecretRendererUtil.maskValue(true, -1)).toBe('true');
    });
  });

  describe('mask', () => {
    it('should not modify the tree', () => {
      const tree = SecretTreeUtil.fromPlain({ db: { pass: 'test-secret' } });

      const masked = SecretRendererUtil.mask(tree, 4);

      expect(SecretTreeUtil.toPlain(masked)).toEqual({ db: { pass: '****' } });
      expect(SecretTreeUtil.toPlain(tree)).toEqual({
        db: { pass: 'test-secret' },
      });
    });
  });

  describe('re-masking', () => {
    const tree = SecretTreeUtil.fromPlain({ db: { pass: 'test-secret' } });

    it('should keep a masked value when masking again with the same length', () => {
      const once = SecretRendererUtil.mask(tree, 4);

      expect(SecretTreeUtil.toPlain(SecretRendererUtil.mask(once, 4))).toEqual(
        SecretTreeUtil.toPlain(once),
      );
    });

    it('should truncate further when masking again with a shorter length', () => {
      const once = SecretRendererUtil.mask(tree, 6);

      expect(SecretTreeUtil.toPlain(once)).toEqual({ db: { pass: '******' } });
      expect(
        SecretTreeUtil.toPlain(SecretRendererUtil.mask(once, 3)),
      ).toEqual({ db: { pass: '***' } });
    });
  });

  describe('native', () => {
    it('should mask values up to the mask length', () => {
      expect(
        render(
          { db: { user: 'alice', pass: 'test-secret' } },
          { maskLength: 4 },
        ),
      ).toBe('db\n  pass=****\n  user=****\n');
    });

    it('should indent nested paths and mark subtrees', () => {
      expect(
        render(
          { secret: { app: { db: { user: 'alice' } }, api: { token: 'x' } } },
          { maskValues: false },
        ),
      ).toBe(
        [
          'secret/',
          '  api',
          '    token=x',
          '  app/',
          '    db',
          '      user=alice',
          '',
        ].join('\n'),
      );
    });

    it('should show values when the mask length is -1', () => {
      expect(render({ db: { user: 'alice' } }, { maskLength: -1 })).toBe(
        'db\n  user=alice\n',
      );
    });

    it('should print only keys', () => {
      expect(
        render({ db: { user: 'alice', pass: 'x' } }, { onlyKeys: true }),
      ).toBe('db\n  pass\n  user\n');
    });

    it('should print only paths', () => {
      expect(
        render(
          { secret: { db: { user: 'alice' }, api: { token: 'x' } } },
          { onlyPaths: true },
        ),
      ).toBe('secret/\n  api\n  db\n');
    });

    it('should print versions from metadata', () => {
      expect(
        render(
          { secret: { db: { user: 'alice' }, api: { token: 'x' } } },
          {
            maskValues: false,
            metadata: { 'secret/db': { version: '3' } },
          },
        ),
      ).toBe('secret/\n  api\n    token=x\n  db [version=3]\n    user=alice\n');
    });

    it('should render an empty tree as nothing', () => {
      expect(render({})).toBe('');
    });

    it('should print null values as empty strings', () => {
      expect(render({ db: { note: null } }, { maskValues: false })).toBe(
        'db\n  note=\n',
      );
    });
  });

  describe('json', () => {
    it('should render sorted, indented JSON', () => {
      expect(
        render(
          { db: { user: 'alice', pass: 'x', port: 5432 } },
          { format: 'json', maskValues: false },
        ),
      ).toBe(
        '{\n  "db": {\n    "pass": "x",\n    "port": 5432,\n    "user": "alice"\n  }\n}\n',
      );
    });

    it('should order integer-like keys lexicographically', () => {
      expect(
        render(
          { db: { '10': 'a', '9': 'b', x: 'c' } },
          { format: 'json', maskValues: false },
        ),
      ).toBe(
        '{\n  "db": {\n    "10": "a",\n    "9": "b",\n    "x": "c"\n  }\n}\n',
      );
    });

    it('should render an empty tree as an empty object', () => {
      expect(render({}, { format: 'json' })).toBe('{}\n');
    });

    it('should mask values', () => {
      expect(
        render({ db: { pass: 'test-secret' } }, { format: 'json', maskLength: 3 }),
      ).toBe('{\n  "db": {\n    "pass": "***"\n  }\n}\n');
    });

    it('should replace leaves with null for only paths', () => {
      expect(
        render({ db: { user: 'alice' } }, { format: 'json', onlyPaths: true }),
      ).toBe('{\n  "db": null\n}\n');
    });

    it('should blank values for only keys', () => {
      expect(
        render({ db: { user: 'alice' } }, { format: 'json', onlyKeys: true }),
      ).toBe('{\n  "db": {\n    "user": ""\n  }\n}\n');
    });
  });

  describe('yaml', () => {
    it('should render sorted YAML', () => {
      expect(
        render(
          { db: { user: 'alice', pass: 'x' } },
          { format: 'yaml', maskValues: false },
        ),
      ).toBe('db:\n  pass: x\n  user: alice\n');
    });

    it('should replace leaves with null for only paths', () => {
      expect(
        render({ db: { user: 'alice' } }, { format: 'yaml', onlyPaths: true }),
      ).toBe('db: null\n');
    });
  });

  describe('shell-export', () => {
    const tree = {
      app: {
        db: { USER: 'alice', PASS: "it's secret" },
        api: { TOKEN: 'test-token' },
      },
    };

    it('should emit one export per key, quoting unsafe values', () => {
      expect(render(tree, { format: 'shell-export', maskValues: false })).toBe(
        [
          'export TOKEN=test-token',
          "export PASS='it'\\''s secret'",
          'export USER=alice',
          '',
        ].join('\n'),
      );
    });

    it('should leave values empty for only keys', () => {
      expect(render(tree, { format: 'shell-export', onlyKeys: true })).toBe(
        'export TOKEN=\nexport PASS=\nexport USER=\n',
      );
    });

    it('should emit nothing for only paths', () => {
      expect(render(tree, { format: 'shell-export', onlyPaths: true })).toBe('');
    });
  });

  it('should render identically regardless of insertion order', () => {
    const a = { b: { y: '2', x: '1' }, a: { k: 'v' } };
    const b = { a: { k: 'v' }, b: { x: '1', y: '2' } };

    for (const format of ['native', 'json', 'yaml', 'shell-export']) {
      expect(render(a, { format, maskValues: false })).toBe(
        render(b, { format, maskValues: false }),
      );
    }
  });
});
