import { describe, it, expect, vi, beforeEach } from 'vitest';
import { capture } from '../src/process.js';
import {
  currentSystem,
  differences,
  filterPackages,
  listPackages,
  nixAttrPath,
  parseAttrPath,
  parseOfborgGist,
  validateAttrPath,
} from '../src/packages.js';
import { UsageError } from '../src/errors.js';
import type { Package } from '../src/types.js';

vi.mock('../src/process.js', () => ({
  capture: vi.fn(),
}));

const mockedCapture = vi.mocked(capture);

function pkg(attr: string, outputs: Record<string, string>): Package {
  return { attr, name: `${attr}-1.0`, outputs };
}

describe('parseAttrPath', () => {
  it('splits a dotted path into names', () => {
    expect(parseAttrPath('python3Packages.requests')).toEqual(['python3Packages', 'requests']);
  });

  it('unquotes names the way nix-env prints them', () => {
    expect(parseAttrPath('nodePackages."@angular/cli"')).toEqual(['nodePackages', '@angular/cli']);
  });

  it('keeps dots inside quotes', () => {
    expect(parseAttrPath('a."b.c".d')).toEqual(['a', 'b.c', 'd']);
  });

  it('unescapes backslashes inside quotes', () => {
    expect(parseAttrPath('a."say \\"hi\\""')).toEqual(['a', 'say "hi"']);
  });

  it('returns null for malformed paths', () => {
    for (const attr of ['', 'a."b', 'a."b"c', 'a""', 'a"b', 'a..b', '.a', 'a.', 'a b']) {
      expect(parseAttrPath(attr)).toBeNull();
    }
  });
});

describe('validateAttrPath', () => {
  it('accepts plain, nested and quoted attribute paths', () => {
    for (const attr of [
      'hello',
      'python3Packages.requests',
      '_1password',
      "foo'",
      'gnome.gnome-shell',
      'nodePackages."@angular/cli"',
    ]) {
      expect(() => validateAttrPath(attr)).not.toThrow();
    }
  });

  it('rejects anything that could escape the build expression', () => {
    for (const attr of ['', 'a; b', '"hello', 'hello}', '1abc', 'a..b', '.hello', 'hello.', 'a b']) {
      expect(() => validateAttrPath(attr)).toThrow(UsageError);
    }
  });

  it('names the offending attribute', () => {
    expect(() => validateAttrPath('a b')).toThrow("'a b' is not a valid nixpkgs attribute path");
  });
});

describe('nixAttrPath', () => {
  it('leaves identifiers bare', () => {
    expect(nixAttrPath('python3Packages.requests')).toBe('python3Packages.requests');
  });

  it('quotes names that are not identifiers', () => {
    expect(nixAttrPath('nodePackages."@angular/cli"')).toBe('nodePackages."@angular/cli"');
  });

  it('quotes keywords', () => {
    expect(nixAttrPath('foo."with"')).toBe('foo."with"');
  });

  it('escapes quotes, backslashes and interpolation', () => {
    expect(nixAttrPath('a."x\\"y"')).toBe('a."x\\"y"');
    expect(nixAttrPath('a."x\\\\y"')).toBe('a."x\\\\y"');
    expect(nixAttrPath('a."${x}"')).toBe('a."\\${x}"');
  });

  it('throws for a malformed path', () => {
    expect(() => nixAttrPath('a."b')).toThrow(UsageError);
  });
});

describe('currentSystem', () => {
  beforeEach(() => {
    mockedCapture.mockReset();
  });

  it('asks Nix for builtins.currentSystem', async () => {
    mockedCapture.mockResolvedValue('"i686-linux"\n');

    await expect(currentSystem()).resolves.toBe('i686-linux');
    expect(mockedCapture).toHaveBeenCalledWith('nix-instantiate', [
      '--eval',
      '--json',
      '--expr',
      'builtins.currentSystem',
    ]);
  });

  it('rejects output that is not a string', async () => {
    mockedCapture.mockResolvedValue('42\n');

    await expect(currentSystem()).rejects.toThrow();
  });
});

describe('listPackages', () => {
  beforeEach(() => {
    mockedCapture.mockReset();
  });

  it('queries nix-env for the directory with output paths as JSON', async () => {
    mockedCapture.mockResolvedValue('{}');

    await listPackages('/cache/pr-1-abc');

    expect(mockedCapture).toHaveBeenCalledWith('nix-env', [
      '-f',
      '/cache/pr-1-abc',
      '-qaP',
      '--json',
      '--out-path',
      '--show-trace',
    ]);
  });

  it('maps entries to packages, dropping outputs without a path', async () => {
    mockedCapture.mockResolvedValue(
      JSON.stringify({
        hello: {
          name: 'hello-2.12.1',
          pname: 'hello',
          version: '2.12.1',
          system: 'x86_64-linux',
          outputs: { out: '/nix/store/aaa-hello-2.12.1' },
        },
        'python3Packages.requests': {
          name: 'python3.12-requests-2.32.3',
          outputs: { out: '/nix/store/bbb-requests', dist: null },
        },
        bare: { name: 'bare-1' },
      }),
    );

    await expect(listPackages('/w')).resolves.toEqual([
      { attr: 'hello', name: 'hello-2.12.1', outputs: { out: '/nix/store/aaa-hello-2.12.1' } },
      { attr: 'python3Packages.requests', name: 'python3.12-requests-2.32.3', outputs: { out: '/nix/store/bbb-requests' } },
      { attr: 'bare', name: 'bare-1', outputs: {} },
    ]);
  });

  it('rejects output that does not look like a nix-env listing', async () => {
    mockedCapture.mockResolvedValue(JSON.stringify({ hello: { version: '1' } }));

    await expect(listPackages('/w')).rejects.toThrow();
  });
});

describe('differences', () => {
  it('reports new attributes and attributes whose outputs changed', () => {
    const before = [pkg('a', { out: '/nix/store/1-a' }), pkg('b', { out: '/nix/store/2-b' }), pkg('c', { out: '/nix/store/3-c' })];
    const after = [pkg('a', { out: '/nix/store/1-a' }), pkg('b', { out: '/nix/store/9-b' }), pkg('d', { out: '/nix/store/4-d' })];

    expect(differences(before, after)).toEqual(new Set(['b', 'd']));
  });

  it('ignores the order outputs are listed in', () => {
    const before = [pkg('a', { out: '/nix/store/1-a', dev: '/nix/store/1-a-dev' })];
    const after = [pkg('a', { dev: '/nix/store/1-a-dev', out: '/nix/store/1-a' })];

    expect(differences(before, after)).toEqual(new Set());
  });

  it('notices an added output', () => {
    const before = [pkg('a', { out: '/nix/store/1-a' })];
    const after = [pkg('a', { out: '/nix/store/1-a', man: '/nix/store/1-a-man' })];

    expect(differences(before, after)).toEqual(new Set(['a']));
  });
});

describe('parseOfborgGist', () => {
  const gist = [
    'x86_64-linux hello',
    'aarch64-linux hello',
    'x86_64-linux python3Packages.requests',
    '',
    'not a valid line here',
    '  x86_64-darwin  jq  ',
  ].join('\n');

  it('returns the attributes for the requested system', () => {
    expect(parseOfborgGist(gist, 'x86_64-linux')).toEqual(new Set(['hello', 'python3Packages.requests']));
  });

  it('tolerates surrounding whitespace', () => {
    expect(parseOfborgGist(gist, 'x86_64-darwin')).toEqual(new Set(['jq']));
  });

  it('returns an empty set for a system with no entries', () => {
    expect(parseOfborgGist(gist, 'i686-linux')).toEqual(new Set());
  });
});

describe('filterPackages', () => {
  it('keeps the changed set when no filter is given', () => {
    expect(filterPackages(new Set(['a', 'b']), new Set())).toEqual(new Set(['a', 'b']));
  });

  it('replaces the changed set with the filter', () => {
    expect(filterPackages(new Set(['a', 'b']), new Set(['c']))).toEqual(new Set(['c']));
  });

  it('returns a fresh set', () => {
    const only = new Set(['c']);
    expect(filterPackages(new Set(), only)).not.toBe(only);
  });
});
