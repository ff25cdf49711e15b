import type { Scope } from '../../../config/schema.js';
import { log } from '../../../core/logger.js';
import { printProfile, requireProfile, type CommandContext } from './shared.js';

export function switchProfile(ctx: CommandContext, profileId: string, scope: Scope = 'local'): void {
  const profiles = ctx.openStore().load();
  const profile = requireProfile(profiles, profileId);

  log(1, 'switch', `Applying '${profileId}' at ${scope} scope`);
  ctx.git.setIdentity(profile, scope);

  const scopeText = scope === 'global' ? 'globally' : 'for this repository';
  ctx.out.log(`✓ Switched to '${profileId}' profile ${scopeText}`);
  printProfile(ctx.out, profile);
}
