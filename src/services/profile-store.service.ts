import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, ProfileError, toError } from '../errors/dispatch-errors.js';
import type { Logger } from '../types/logger.types.js';
import type { AddProfileOptions, Profile } from '../types/profile.types.js';

const StoredProfileSchema = z.object({
  server: z.string(),
  apiKey: z.string(),
  fromAddress: z.string().nullish(),
  fromName: z.string().nullish(),
});

const ProfileDocumentSchema = z.object({
  defaultProfile: z.string().nullable().default(null),
  profiles: z.record(StoredProfileSchema).default({}),
});

type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;

// Keys that cannot be stored as own properties of the profiles object.
const RESERVED_NAMES = new Set(['__proto__']);

/**
 * Picks the profile name for a run: the explicit flag, then the environment
 * override, then the stored default. Empty strings count as unset.
 * @throws ConfigurationError when none is set
 */
export function resolveProfileName(
  explicit: string | undefined,
  environmentValue: string | undefined,
  storedDefault: string | null | undefined
): string {
  const candidates = [explicit, environmentValue, storedDefault ?? undefined];
  const name = candidates.find((value): value is string => typeof value === 'string' && value.trim() !== '');
  if (!name) {
    throw new ConfigurationError(
      'no profile configured: pass --profile, set MAILGOAT_PROFILE, or run `mailgoat profile add <name>`'
    );
  }
  return name.trim();
}

export interface ProfileStore {
  add(profile: Profile, options?: AddProfileOptions): Promise<void>;
  list(): Promise<Profile[]>;
  get(name: string): Promise<Profile>;
  use(name: string): Promise<void>;
  getDefaultName(): Promise<string | null>;
  /**
   * Resolves and loads the profile for a run.
   * @throws ConfigurationError when no profile can be resolved
   * @throws ProfileError when the resolved name is not stored
   */
  resolve(explicit: string | undefined, environmentValue: string | undefined): Promise<Profile>;
}

/**
 * Profiles kept in a single JSON document:
 * `{ "defaultProfile": "work", "profiles": { "work": { ... } } }`.
 */
export class FileProfileStore implements ProfileStore {
  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  async add(profile: Profile, options: AddProfileOptions = {}): Promise<void> {
    const name = profile.name.trim();
    if (!name) {
      throw new ProfileError('profile name is required');
    }
    if (RESERVED_NAMES.has(name)) {
      throw new ProfileError(`invalid profile name: ${name}`);
    }
    if (!profile.server.trim()) {
      throw new ProfileError('server is required');
    }
    if (!profile.apiKey.trim()) {
      throw new ProfileError('api key is required');
    }

    const document = await this.readDocument();
    document.profiles[name] = {
      server: profile.server.trim(),
      apiKey: profile.apiKey.trim(),
      fromAddress: profile.fromAddress ?? null,
      fromName: profile.fromName ?? null,
    };
    if (options.makeDefault || document.defaultProfile === null) {
      document.defaultProfile = name;
    }
    await this.writeDocument(document);

    this.logger.info('Profile saved', { profile: name, isDefault: document.defaultProfile === name });
  }

  async list(): Promise<Profile[]> {
    const document = await this.readDocument();
    return Object.keys(document.profiles)
      .sort()
      .map(name => this.toProfile(name, document));
  }

  async get(name: string): Promise<Profile> {
    const document = await this.readDocument();
    return this.toProfile(name, document);
  }

  async use(name: string): Promise<void> {
    const document = await this.readDocument();
    if (!Object.hasOwn(document.profiles, name)) {
      throw new ProfileError(`profile not found: ${name}`);
    }
    document.defaultProfile = name;
    await this.writeDocument(document);
    this.logger.info('Default profile changed', { profile: name });
  }

  async getDefaultName(): Promise<string | null> {
    const document = await this.readDocument();
    return document.defaultProfile;
  }

  async resolve(explicit: string | undefined, environmentValue: string | undefined): Promise<Profile> {
    const document = await this.readDocument();
    const name = resolveProfileName(explicit, environmentValue, document.defaultProfile);
    return this.toProfile(name, document);
  }

  private toProfile(name: string, document: ProfileDocument): Profile {
    const stored = Object.hasOwn(document.profiles, name) ? document.profiles[name] : undefined;
    if (!stored) {
      throw new ProfileError(`profile not found: ${name}`);
    }
    return {
      name,
      server: stored.server,
      apiKey: stored.apiKey,
      fromAddress: stored.fromAddress ?? undefined,
      fromName: stored.fromName ?? undefined,
    };
  }

  private async readDocument(): Promise<ProfileDocument> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { defaultProfile: null, profiles: {} };
      }
      throw new ProfileError(`cannot read profiles from ${this.path}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new ProfileError(`profile file ${this.path} is not valid JSON`, { cause: toError(error) });
    }

    const parsed = ProfileDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ProfileError(`profile file ${this.path} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  private async writeDocument(document: ProfileDocument): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
      await rename(tempPath, this.path);
    } catch (error) {
      throw new ProfileError(`cannot write profiles to ${this.path}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
  }
}
