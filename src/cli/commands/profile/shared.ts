import type { Profile, ProfileSet } from '../../../config/schema.js';
import { NotFoundError } from '../../../core/errors.js';
import { findProfile, profileNames } from '../../../core/profile-store.js';
import type { CommandContext, Output } from '../../context.js';

export type { CommandContext };

export function requireProfile(profiles: ProfileSet, id: string): Profile {
  const profile = findProfile(profiles, id);
  if (!profile) {
    const available = profileNames(profiles);
    const listing = available.length > 0 ? available.join(', ') : '(none)';
    throw new NotFoundError(id, available, {
      hint: `Available profiles: ${listing}\nUse 'git usr add' to create a new profile`
    });
  }
  return profile;
}

export function printProfile(out: Output, profile: Profile, indent = '   '): void {
  out.log(`${indent}Name:  ${profile.name}`);
  out.log(`${indent}Email: ${profile.email}`);
}
