import fs from 'node:fs';

import { resolvePath, type ConfigLocationOptions } from '../config/index.js';
import { DEFAULT_PROFILES, ProfileSetSchema, type Profile, type ProfileSet } from '../config/schema.js';
import { IOError, ParseError, ValidationError, errorCode } from './errors.js';
import { log } from './logger.js';

/**
 * Reads and writes the profile set as one JSON document.
 *
 * Every mutation rewrites the whole file. There is no locking: two processes
 * saving at once leave whichever wrote last.
 */
export class ProfileStore {
  constructor(readonly filePath: string) {}

  load(): ProfileSet {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        log(1, 'store', `No profile file at ${this.filePath}, writing defaults`);
        const defaults = cloneProfiles(DEFAULT_PROFILES);
        this.save(defaults);
        return defaults;
      }
      throw new IOError(`Cannot read ${this.filePath}`, this.filePath, { cause: error });
    }

    const profiles = parseProfiles(raw, this.filePath);
    log(2, 'store', `Loaded ${Object.keys(profiles).length} profile(s) from ${this.filePath}`);
    return profiles;
  }

  save(profiles: ProfileSet): void {
    const data = JSON.stringify(profiles, null, 2) + '\n';
    try {
      fs.writeFileSync(this.filePath, data, 'utf8');
    } catch (error) {
      throw new IOError(`Cannot write ${this.filePath}`, this.filePath, { cause: error });
    }
    log(2, 'store', `Saved ${Object.keys(profiles).length} profile(s) to ${this.filePath}`);
  }

  /** Writes the default set if the file does not exist yet. */
  seed(): void {
    if (!fs.existsSync(this.filePath)) {
      this.load();
    }
  }
}

/** Resolves the profile file location, creates its directory and seeds it on first run. */
export function initProfileStore(options: ConfigLocationOptions = {}): ProfileStore {
  const store = new ProfileStore(resolvePath(options));
  store.seed();
  return store;
}

/** A key that a plain object cannot hold as its own property. */
export const RESERVED_PROFILE_NAME = '__proto__';

export function assertProfileName(id: string): void {
  if (id === RESERVED_PROFILE_NAME) {
    throw new ValidationError(`Profile name '${id}' is reserved`, { hint: 'Choose another profile name.' });
  }
}

export function parseProfiles(raw: string, filePath: string): ProfileSet {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ParseError(`Malformed JSON in ${filePath}`, filePath, { cause: error });
  }

  // zod drops `__proto__` keys from records
  if (
    typeof document === 'object' &&
    document !== null &&
    Object.prototype.hasOwnProperty.call(document, RESERVED_PROFILE_NAME)
  ) {
    throw new ParseError(
      `Invalid profile file ${filePath}: '${RESERVED_PROFILE_NAME}' is not a valid profile name`,
      filePath
    );
  }

  const result = ProfileSetSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new ParseError(`Invalid profile file ${filePath}${where}: ${issue?.message ?? 'unexpected shape'}`, filePath, {
      hint: 'Each entry must look like {"name": "...", "email": "..."}'
    });
  }
  return result.data;
}

export function profileNames(profiles: ProfileSet): string[] {
  return Object.keys(profiles).sort((a, b) => a.localeCompare(b));
}

export function findProfile(profiles: ProfileSet, id: string): Profile | undefined {
  return Object.prototype.hasOwnProperty.call(profiles, id) ? profiles[id] : undefined;
}

function cloneProfiles(profiles: ProfileSet): ProfileSet {
  const copy: ProfileSet = {};
  for (const [id, profile] of Object.entries(profiles)) {
    copy[id] = { ...profile };
  }
  return copy;
}
