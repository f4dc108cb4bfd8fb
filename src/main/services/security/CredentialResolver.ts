/**
 * CredentialResolver
 * Resolves credential profiles to usernames and secrets before a run starts.
 *
 * Secret storage itself belongs to a CredentialProvider (OS keyring, vault,
 * environment). Every profile a run needs is resolved up front so no worker
 * ever waits on the store, and a missing profile fails validation instead of
 * failing devices one by one.
 */

import type { Credentials, Device } from '@shared/types';
import { ValidationError } from '../../errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('Credentials');

export interface CredentialProvider {
  /** Returns null when the profile is unknown. */
  getCredentials(profile: string): Promise<Credentials | null>;
}

/**
 * Profiles held in memory, for embedders that already hold the secrets
 * and by tests.
 */
export class InMemoryCredentialProvider implements CredentialProvider {
  private readonly profiles = new Map<string, Credentials>();

  constructor(profiles: Record<string, Credentials> = {}) {
    for (const [name, credentials] of Object.entries(profiles)) {
      this.profiles.set(name, { ...credentials });
    }
  }

  set(profile: string, credentials: Credentials): void {
    this.profiles.set(profile, { ...credentials });
  }

  async getCredentials(profile: string): Promise<Credentials | null> {
    const found = this.profiles.get(profile);
    return found ? { ...found } : null;
  }
}

/**
 * Reads `RUNNER_<PROFILE>_USERNAME`, `RUNNER_<PROFILE>_PASSWORD` and optionally
 * `RUNNER_<PROFILE>_ENABLE_SECRET`. The profile name is upper-cased and every
 * non-alphanumeric character becomes '_'.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  static variablePrefix(profile: string): string {
    return `RUNNER_${profile.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_`;
  }

  async getCredentials(profile: string): Promise<Credentials | null> {
    const prefix = EnvCredentialProvider.variablePrefix(profile);
    const username = this.env[`${prefix}USERNAME`];
    const password = this.env[`${prefix}PASSWORD`];
    if (!username || password === undefined) return null;

    const enableSecret = this.env[`${prefix}ENABLE_SECRET`];
    return enableSecret ? { username, password, enableSecret } : { username, password };
  }
}

export class CredentialResolver {
  constructor(private readonly provider: CredentialProvider) {}

  /**
   * Resolve the credentials of every device, keyed by profile name.
   * Devices without an override use `defaultProfile`.
   */
  async resolveAll(
    devices: readonly Device[],
    defaultProfile: string,
  ): Promise<Map<string, Readonly<Credentials>>> {
    const profiles = new Set<string>([defaultProfile]);
    for (const device of devices) {
      profiles.add(device.credentialProfile ?? defaultProfile);
    }

    const resolved = new Map<string, Readonly<Credentials>>();
    for (const profile of profiles) {
      const credentials = await this.provider.getCredentials(profile);
      if (!credentials || !credentials.username) {
        throw new ValidationError('MissingCredentials', `No credentials found for profile "${profile}"`);
      }
      resolved.set(profile, Object.freeze({ ...credentials }));
      log.debug(`Resolved profile "${profile}"`, {
        username: credentials.username,
        password: credentials.password,
        enableSecret: credentials.enableSecret,
      });
    }
    return resolved;
  }

  static profileFor(device: Device, defaultProfile: string): string {
    return device.credentialProfile ?? defaultProfile;
  }
}
