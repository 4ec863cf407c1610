import { minorsByMajor, selectUpgrade, templatePattern } from '@/tools/check-upstream-versions/selection';

describe('templatePattern', () => {
  it('captures the version and escapes the rest', () => {
    expect(templatePattern('{version}-slim').exec('3.12.4-slim')?.[1]).toBe('3.12.4');
    expect(templatePattern('{version}.x').exec('3.12.4-x')).toBeNull();
  });
});

describe('minorsByMajor', () => {
  it('groups minors under their major', () => {
    expect(minorsByMajor(['3.11', '3.12', '3.12.1', '20'])).toEqual(
      new Map([
        [3, new Set([11, 12])],
        [20, new Set([0])],
      ]),
    );
  });
});

describe('selectUpgrade', () => {
  const available = ['3.12.2', '3.12.10', '3.13.0', '4.0.0', '3.12.11rc1'];

  it('stays on the minor when strict', () => {
    expect(selectUpgrade('3.12.1', available, { strictMinor: true })).toBe('3.12.10');
  });

  it('moves across minors but never across majors', () => {
    expect(selectUpgrade('3.12.1', available, { strictMinor: false })).toBe('3.13.0');
  });

  it('returns undefined when nothing is newer', () => {
    expect(selectUpgrade('1.22', ['1.22', '1.21.9'], { strictMinor: false })).toBeUndefined();
  });

  it('reads versions through the tag template', () => {
    expect(
      selectUpgrade('3.12.1', ['3.12.2-slim', '3.12.3-alpine', '3.12.5'], {
        strictMinor: false,
        tagTemplate: '{version}-slim',
      }),
    ).toBe('3.12.2');
  });

  it('keeps the first of two equal versions', () => {
    expect(selectUpgrade('1.0', ['1.01', '1.1'], { strictMinor: false })).toBe('1.01');
  });

  it('prefers the longer of two versions with a common prefix', () => {
    expect(selectUpgrade('1.0', ['1.1', '1.1.0'], { strictMinor: false })).toBe('1.1.0');
  });
});
