import { CAPABILITIES, type Capability } from './constants.js';

export type Grant = 'granted' | 'denied';

export type CapabilityGrants = Record<Capability, Grant>;

export interface PermissionGate {
  requestCapabilities(capabilities: readonly Capability[]): Promise<CapabilityGrants>;
}

function grantAll(grant: Grant): CapabilityGrants {
  return { scan: grant, connect: grant, location: grant, notify: grant };
}

/**
 * Fixed answers, for tests and the mock radio
 */
export class StaticPermissionGate implements PermissionGate {
  private grants: CapabilityGrants;

  constructor(overrides: Partial<CapabilityGrants> = {}) {
    this.grants = { ...grantAll('granted'), ...overrides };
  }

  set(capability: Capability, grant: Grant): void {
    this.grants[capability] = grant;
  }

  async requestCapabilities(capabilities: readonly Capability[]): Promise<CapabilityGrants> {
    const result = grantAll('granted');
    for (const capability of capabilities) {
      result[capability] = this.grants[capability];
    }
    return result;
  }
}

/**
 * Desktop hosts have no runtime prompts: the adapter either lets this process
 * use it or reports 'unauthorized'. Location and notifications need no grant.
 */
export class AdapterPermissionGate implements PermissionGate {
  constructor(private readonly adapterState: () => string) {}

  async requestCapabilities(capabilities: readonly Capability[] = CAPABILITIES): Promise<CapabilityGrants> {
    const radioGrant: Grant = this.adapterState() === 'unauthorized' ? 'denied' : 'granted';
    const result = grantAll('granted');
    for (const capability of capabilities) {
      if (capability === 'scan' || capability === 'connect') {
        result[capability] = radioGrant;
      }
    }
    return result;
  }
}
