import { DefaultAzureCredential, DeviceCodeCredential } from '@azure/identity';
import { describe, expect, it } from 'vitest';
import { createCredential, selectCredentialKind } from './credential.js';

describe('selectCredentialKind', () => {
  it('uses device code only when asked', () => {
    expect(selectCredentialKind({ useDeviceAuthentication: true })).toBe('device-code');
    expect(selectCredentialKind({ useDeviceAuthentication: false, tenantId: 'T1' })).toBe('default');
    expect(selectCredentialKind({})).toBe('default');
  });
});

describe('createCredential', () => {
  it('builds a device code credential', () => {
    expect(createCredential({ tenantId: 'T1', useDeviceAuthentication: true })).toBeInstanceOf(DeviceCodeCredential);
  });

  it('builds the default credential chain otherwise', () => {
    expect(createCredential({ tenantId: 'T1' })).toBeInstanceOf(DefaultAzureCredential);
  });
});
