/**
 * Domain Name Validators.
 *
 * Normalizes and validates the domain names and TLDs agents pass to tools.
 */

import { InvalidDomainError, InvalidTldError } from './errors.js';

/**
 * Valid domain label.
 * - 1-63 characters
 * - Alphanumeric and hyphens
 * - Cannot start or end with hyphen
 */
const DOMAIN_LABEL_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * Valid TLD: letters, plus digits and hyphens for IDN forms (xn--p1ai).
 */
const TLD_PATTERN = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/;

/**
 * Characters that are definitely not allowed in domains.
 */
const INVALID_CHARS = /[^a-z0-9.-]/;

const MAX_DOMAIN_LENGTH = 253;

/**
 * Validate and normalize a full domain name (e.g., "Example.com").
 *
 * @returns Normalized domain name (lowercase, no trailing dot)
 * @throws InvalidDomainError if invalid
 */
export function validateDomain(name: string): string {
  const normalized = name.trim().toLowerCase().replace(/\.$/, '');

  if (!normalized) {
    throw new InvalidDomainError(name, 'Domain name cannot be empty');
  }

  if (normalized.length > MAX_DOMAIN_LENGTH) {
    throw new InvalidDomainError(
      name,
      `Domain name too long (${normalized.length} chars, max ${MAX_DOMAIN_LENGTH})`,
    );
  }

  const invalidChar = normalized.match(INVALID_CHARS)?.[0];
  if (invalidChar !== undefined) {
    throw new InvalidDomainError(
      name,
      `Contains invalid character: "${invalidChar}"`,
    );
  }

  const labels = normalized.split('.');
  if (labels.length < 2) {
    throw new InvalidDomainError(name, 'Missing extension (e.g., ".com")');
  }

  for (const label of labels) {
    if (!label) {
      throw new InvalidDomainError(name, 'Contains an empty label');
    }
    if (!DOMAIN_LABEL_PATTERN.test(label)) {
      if (label.startsWith('-') || label.endsWith('-')) {
        throw new InvalidDomainError(
          name,
          `Label "${label}" cannot start or end with a hyphen`,
        );
      }
      throw new InvalidDomainError(name, `Label "${label}" is too long (max 63)`);
    }
  }

  return normalized;
}

/**
 * Validate and normalize a TLD (".COM" → "com").
 *
 * @throws InvalidTldError if invalid
 */
export function validateTld(tld: string): string {
  const normalized = tld.trim().toLowerCase().replace(/^\./, '');

  if (!normalized) {
    throw new InvalidTldError(tld, 'TLD cannot be empty');
  }

  if (!TLD_PATTERN.test(normalized)) {
    throw new InvalidTldError(
      tld,
      'Use 2-63 letters, or an xn-- form for internationalized TLDs',
    );
  }

  return normalized;
}
