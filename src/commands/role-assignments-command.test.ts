import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MissingRequiredFieldError } from '../errors.js';
import type { ResourceSummary } from '../role-assignments/types.js';
import { thrownBy } from '../testing/errors.js';
import { createFakeAzure, type FakeAzureSetup } from '../testing/fake-azure.js';
import { getLogger } from '../utils/logger.js';
import {
  ROLE_ASSIGNMENTS_CONFIG_PREFIX,
  parseRoleAssignmentsArgs,
  resolveRoleAssignmentsParameters,
  runRoleAssignments,
} from './role-assignments-command.js';

const SITE: ResourceSummary = {
  id: '/subscriptions/S1/resourceGroups/rg-app/providers/Microsoft.Web/sites/func-app',
  name: 'func-app',
  type: 'Microsoft.Web/sites',
};

const AZURE: FakeAzureSetup = {
  subscriptions: [{ subscriptionId: 'S1' }],
  resources: [SITE],
  users: { 'ops@contoso.example': 'oid-ops' },
  assignments: [
    { id: 'ra-1', scope: '/subscriptions/S1', roleDefinitionId: 'rd-reader', principalId: 'oid-ops' },
    { id: 'ra-2', scope: SITE.id.toLowerCase(), roleDefinitionId: 'rd-website', principalId: 'oid-ops' },
    { id: 'ra-3', scope: SITE.id, roleDefinitionId: 'rd-owner', principalId: 'oid-someone-else' },
  ],
  roleNames: { 'rd-reader': 'Reader', 'rd-website': 'Website Contributor', 'rd-owner': 'Owner' },
};

const CONFIG = {
  context: { defaultSubscriptionId: 'S1' },
  lookup: { resourceName: 'func-app', resourceType: 'Microsoft.Web/sites' },
  principal: { upn: 'ops@contoso.example' },
};

describe('parseRoleAssignmentsArgs', () => {
  it('parses lookup and principal flags', () => {
    expect(
      parseRoleAssignmentsArgs(['--resource-name', 'func-app', '--upn', 'ops@contoso.example', '--json', '--subscription-id', 'S1'])
    ).toEqual({
      help: false,
      json: true,
      resourceName: 'func-app',
      upn: 'ops@contoso.example',
      subscriptionId: 'S1',
    });
  });

  it('rejects positional arguments', () => {
    expect(() => parseRoleAssignmentsArgs(['func-app'])).toThrow(
      'Unexpected argument: func-app (all values are passed as named flags)'
    );
  });
});

describe('resolveRoleAssignmentsParameters', () => {
  it('takes lookup and principal from the config, using the subscription alias', () => {
    const parameters = resolveRoleAssignmentsParameters({ help: false, json: false }, CONFIG);

    expect(parameters.subscriptionId).toBe('S1');
    expect(parameters.resource).toEqual({ name: 'func-app', resourceType: 'Microsoft.Web/sites', resourceGroup: undefined });
    expect(parameters.principal).toEqual({ objectId: undefined, userPrincipalName: 'ops@contoso.example' });
  });

  it('ignores the config principal when a principal flag is given', () => {
    const parameters = resolveRoleAssignmentsParameters(
      { help: false, json: false, upn: 'admin@contoso.example' },
      { ...CONFIG, principal: { objectId: 'oid-config' } }
    );

    expect(parameters.principal).toEqual({ objectId: undefined, userPrincipalName: 'admin@contoso.example' });
  });

  it('requires a principal', () => {
    expect(() => resolveRoleAssignmentsParameters({ help: false, json: false }, { ...CONFIG, principal: {} })).toThrow(
      'Missing required value: principal.objectId or principal.upn (--object-id or --upn)'
    );
  });

  it('requires a resource name', () => {
    const error = thrownBy(
      () =>
        resolveRoleAssignmentsParameters(
          { help: false, json: false, objectId: 'oid-1' },
          { context: { subscriptionId: 'S1' } }
        ),
      MissingRequiredFieldError
    );

    expect(error.field).toBe('lookup.resourceName');
  });
});

describe('runRoleAssignments', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'az-toolkit-roles-'));
    fs.writeFileSync(path.join(tempDir, `${ROLE_ASSIGNMENTS_CONFIG_PREFIX}.prod.json`), JSON.stringify(CONFIG));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('finds the resource, resolves the UPN and classifies assignments', async () => {
    const { deps, calls } = createFakeAzure(AZURE);

    const result = await runRoleAssignments({ help: false, json: false, configName: 'prod', configDir: tempDir }, deps);

    expect(calls.resourceQueries).toEqual([
      { name: 'func-app', resourceType: 'Microsoft.Web/sites', resourceGroup: undefined },
    ]);
    expect(calls.userLookups).toEqual(['ops@contoso.example']);
    expect(result.resourceId).toBe(SITE.id);
    expect(result.principalId).toBe('oid-ops');
    expect(result.assignments.map(a => [a.id, a.roleName, a.kind])).toEqual([
      ['ra-2', 'Website Contributor', 'direct'],
      ['ra-1', 'Reader', 'inherited'],
    ]);
    expect(console.log).toHaveBeenCalledWith('Found 2 assignment(s): 1 direct, 1 inherited\n');
  });

  it('prints JSON rows with --json', async () => {
    const { deps } = createFakeAzure(AZURE);

    await runRoleAssignments(
      { help: false, json: true, configName: 'prod', configDir: tempDir, objectId: 'oid-ops' },
      deps
    );

    const stdout = vi
      .mocked(console.log)
      .mock.calls.map(args => args.join(' '))
      .join('\n');
    expect(JSON.parse(stdout)).toEqual([
      { role: 'Website Contributor', kind: 'Direct', scope: SITE.id.toLowerCase() },
      { role: 'Reader', kind: 'Inherited', scope: '/subscriptions/S1' },
    ]);
  });

  it('keeps status lines after a --json run that fails', async () => {
    const { deps } = createFakeAzure({ ...AZURE, resources: [] });
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      runRoleAssignments({ help: false, json: true, configName: 'prod', configDir: tempDir }, deps)
    ).rejects.toThrow("No resource found with name 'func-app'");
    expect(console.log).not.toHaveBeenCalled();

    getLogger().error('lookup failed');
    getLogger().info('next run');
    expect(error).toHaveBeenCalledWith('❌ lookup failed');
    expect(console.log).toHaveBeenCalledWith('ℹ️  next run');
  });

  it('reports when the principal has no assignments', async () => {
    const { deps } = createFakeAzure(AZURE);

    const result = await runRoleAssignments(
      { help: false, json: false, configName: 'prod', configDir: tempDir, objectId: 'oid-nobody' },
      deps
    );

    expect(result.assignments).toEqual([]);
    expect(console.log).toHaveBeenCalledWith(`ℹ️  No role assignments found for oid-nobody on ${SITE.id}`);
  });

  it('fails when the resource does not exist', async () => {
    const { deps, calls } = createFakeAzure({ ...AZURE, resources: [] });

    await expect(
      runRoleAssignments({ help: false, json: false, configName: 'prod', configDir: tempDir }, deps)
    ).rejects.toThrow("No resource found with name 'func-app', type 'Microsoft.Web/sites'");
    expect(calls.assignmentQueries).toEqual([]);
  });
});
