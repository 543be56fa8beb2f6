import { describe, it, expect } from 'vitest';
import { isExtensionNamespace } from './namespaces.js';

describe('isExtensionNamespace', () => {
  it('treats standard namespaces as non-extensions', () => {
    expect(isExtensionNamespace('us-gaap')).toBe(false);
    expect(isExtensionNamespace('ifrs-full')).toBe(false);
    expect(isExtensionNamespace('dei')).toBe(false);
  });

  it('ignores year suffix and case', () => {
    expect(isExtensionNamespace('us-gaap-2024')).toBe(false);
    expect(isExtensionNamespace('US-GAAP')).toBe(false);
  });

  it('treats filer prefixes as extensions', () => {
    expect(isExtensionNamespace('aci')).toBe(true);
    expect(isExtensionNamespace('aci-2024')).toBe(true);
  });

  it('treats an empty namespace as not an extension', () => {
    expect(isExtensionNamespace('  ')).toBe(false);
  });

  it('uses a supplied allow-list', () => {
    expect(isExtensionNamespace('us-gaap', ['ifrs-full'])).toBe(true);
    expect(isExtensionNamespace('ifrs-full-2023', ['ifrs-full'])).toBe(false);
  });
});
