import { requireProfile, type CommandContext } from './shared.js';

export function removeProfile(ctx: CommandContext, profileId: string): void {
  const store = ctx.openStore();
  const profiles = store.load();
  requireProfile(profiles, profileId);

  delete profiles[profileId];
  store.save(profiles);

  ctx.out.log(`✓ Profile '${profileId}' removed!`);
}
