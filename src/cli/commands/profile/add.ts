import { ValidationError } from '../../../core/errors.js';
import { assertProfileName, findProfile } from '../../../core/profile-store.js';
import { printProfile, type CommandContext } from './shared.js';

export async function addProfile(
  ctx: CommandContext,
  profileId: string,
  name?: string,
  email?: string
): Promise<void> {
  assertProfileName(profileId);
  const store = ctx.openStore();
  const profiles = store.load();
  let displayName = name?.trim() ?? '';
  let address = email?.trim() ?? '';

  const existing = findProfile(profiles, profileId);
  if (existing && (!displayName || !address)) {
    ctx.out.log(`Profile '${profileId}' already exists:`);
    printProfile(ctx.out, existing, '  ');
    ctx.out.log('\nTo update, provide both name and email.');
    return;
  }

  if (!displayName) {
    displayName = (await ctx.input.ask('Enter name: ')).trim();
  }
  if (!address) {
    address = (await ctx.input.ask('Enter email: ')).trim();
  }

  if (!displayName || !address) {
    throw new ValidationError('Name and email are required!');
  }

  profiles[profileId] = { name: displayName, email: address };
  store.save(profiles);

  ctx.out.log(`✓ Profile '${profileId}' saved!`);
  printProfile(ctx.out, profiles[profileId]);
  ctx.out.log(`\nUse: git usr ${profileId}`);
}
