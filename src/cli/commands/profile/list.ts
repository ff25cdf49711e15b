import { sameIdentity } from '../../../core/git-config.js';
import { profileNames } from '../../../core/profile-store.js';
import { printProfile, type CommandContext } from './shared.js';

interface ListOptions {
  json?: boolean;
}

export function listProfiles(ctx: CommandContext, options: ListOptions = {}): void {
  const profiles = ctx.openStore().load();
  const identity = ctx.git.getIdentity();
  const ids = profileNames(profiles);
  const currentId = ids.find((id) => sameIdentity(profiles[id], identity));

  if (options.json) {
    const output = ids.map((id) => ({
      id,
      name: profiles[id].name,
      email: profiles[id].email,
      current: id === currentId
    }));
    ctx.out.log(JSON.stringify(output, null, 2));
    return;
  }

  ctx.out.log('\nAvailable profiles:');
  ctx.out.log('-'.repeat(50));

  if (ids.length === 0) {
    ctx.out.log('No profiles found.');
    ctx.out.log('Run: git usr add <profile>\n');
    return;
  }

  for (const id of ids) {
    const marker = id === currentId ? '▶  ' : '   ';
    ctx.out.log(`${marker}${id}`);
    printProfile(ctx.out, profiles[id]);
    ctx.out.log();
  }
}
