import { validateDomain, validateTld } from '../../src/utils/validators';
import { InvalidDomainError, InvalidTldError } from '../../src/utils/errors';

describe('validateDomain', () => {
  it.each([
    ['example.com', 'example.com'],
    ['Example.COM', 'example.com'],
    ['  example.com  ', 'example.com'],
    ['example.com.', 'example.com'],
    ['sub.example.co.uk', 'sub.example.co.uk'],
    ['xn--bcher-kva.example', 'xn--bcher-kva.example'],
  ])('normalizes %p to %p', (input, expected) => {
    expect(validateDomain(input)).toBe(expected);
  });

  it.each([
    ['', 'Domain name cannot be empty'],
    ['example', 'Missing extension (e.g., ".com")'],
    ['exa mple.com', 'Contains invalid character: " "'],
    ['example_site.com', 'Contains invalid character: "_"'],
    ['example..com', 'Contains an empty label'],
    ['-example.com', 'Label "-example" cannot start or end with a hyphen'],
    [`${'a'.repeat(64)}.com`, `Label "${'a'.repeat(64)}" is too long (max 63)`],
  ])('rejects %p', (input, reason) => {
    expect(() => validateDomain(input)).toThrow(`- ${reason}`);
  });

  it('rejects names longer than 253 characters', () => {
    const name = `${'a'.repeat(60)}.`.repeat(5) + 'com';

    expect(() => validateDomain(name)).toThrow(InvalidDomainError);
  });
});

describe('validateTld', () => {
  it.each([
    ['com', 'com'],
    ['.IO', 'io'],
    [' net ', 'net'],
    ['xn--p1ai', 'xn--p1ai'],
  ])('normalizes %p to %p', (input, expected) => {
    expect(validateTld(input)).toBe(expected);
  });

  it.each(['', '.', 'c', 'co.uk', '123'])('rejects %p', (input) => {
    expect(() => validateTld(input)).toThrow(InvalidTldError);
  });
});
