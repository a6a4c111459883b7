import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { generateNamespaceName, MAX_NAMESPACE_NAME_LENGTH, sanitizeName } from '../../../src/core/namespace/naming.js';

const id = 'a80ebe94';
const timestamp = 1536849367000;
const base = 'kubetest-a80ebe94-1536849367';

describe('generateNamespaceName', () => {
  it.each([
    ['', base],
    ['TestName', `${base}-testname`],
    ['Test-Name', `${base}-test-name`],
    ['Test1_FOO-BAR_2', `${base}-test1-foo-bar-2`],
    ['123456', `${base}-123456`],
    ['___', base],
    ['test-'.repeat(14), `${base}-test-test-test-test-test-test-test`],
    ['test[a]-foo', `${base}-test-a--foo`],
  ])('names a namespace for test %j', (testName, expected) => {
    expect(generateNamespaceName({ testName, id, timestamp })).toBe(expected);
  });

  it('uses the given prefix and the first eight characters of the id', () => {
    expect(generateNamespaceName({ prefix: 'ci', id: '0123456789abcdef', timestamp: 5_999 })).toBe('ci-01234567-5');
  });

  it('produces valid namespace names for any test name', () => {
    fc.assert(
      fc.property(fc.string(), (testName) => {
        const name = generateNamespaceName({ testName, id, timestamp });
        expect(name.length).toBeLessThanOrEqual(MAX_NAMESPACE_NAME_LENGTH);
        expect(name).toMatch(/^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/);
        expect(name.startsWith(base)).toBe(true);
      }),
      { numRuns: 100 }
    );
  });

  it('differs between calls without an explicit id', () => {
    expect(generateNamespaceName({ timestamp })).not.toBe(generateNamespaceName({ timestamp }));
  });
});

describe('sanitizeName', () => {
  it('keeps lower-case alphanumerics and dashes', () => {
    expect(sanitizeName('Suite/Case #1')).toBe('suite-case--1');
  });
});
