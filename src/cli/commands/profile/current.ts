import type { Scope } from '../../../config/schema.js';
import type { CommandContext } from './shared.js';

interface CurrentOptions {
  json?: boolean;
  scope?: Scope;
}

export function showCurrent(ctx: CommandContext, options: CurrentOptions = {}): void {
  const { name, email } = ctx.git.getIdentity(options.scope);

  if (options.json) {
    ctx.out.log(JSON.stringify({ name: name || null, email: email || null }, null, 2));
    return;
  }

  const where = options.scope === 'global' ? 'global git configuration' : 'git configuration';
  if (name && email) {
    ctx.out.log(`\nCurrent ${where}:`);
    ctx.out.log(`   Name:  ${name}`);
    ctx.out.log(`   Email: ${email}`);
  } else {
    ctx.out.log(`No ${where} found`);
  }
}
