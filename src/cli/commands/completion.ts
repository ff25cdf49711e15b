import { profileNames } from '../../core/profile-store.js';
import { generateCompletion } from '../completion.js';
import type { CommandContext } from '../context.js';

export function printCompletion(ctx: CommandContext, shell: string): void {
  const names = profileNames(ctx.openStore().load());
  ctx.out.log(generateCompletion(shell, names));
}
