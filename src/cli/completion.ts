import { ValidationError } from '../core/errors.js';

export const SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;
export type Shell = (typeof SHELLS)[number];

const BIN = 'git-usr';

const COMMANDS: ReadonlyArray<readonly [name: string, description: string]> = [
  ['list', 'List all profiles'],
  ['current', 'Show current git config'],
  ['add', 'Add or update a profile'],
  ['remove', 'Remove a profile'],
  ['version', 'Show version information'],
  ['help', 'Show help'],
  ['completion', 'Generate completion script']
];

export function isShell(value: string): value is Shell {
  return (SHELLS as readonly string[]).includes(value);
}

export function generateCompletion(shell: string, profiles: string[]): string {
  if (!isShell(shell)) {
    throw new ValidationError(`Unsupported shell: ${shell}. Supported: ${SHELLS.join(', ')}`);
  }
  switch (shell) {
    case 'bash':
      return bashCompletion(profiles);
    case 'zsh':
      return zshCompletion(profiles);
    case 'fish':
      return fishCompletion(profiles);
    case 'powershell':
      return powershellCompletion(profiles);
  }
}

export function bashCompletion(profiles: string[]): string {
  const names = profiles.join(' ');
  const commands = COMMANDS.map(([name]) => name).join(' ');
  return `# bash completion for ${BIN}
_git_usr() {
    local cur prev
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"
    prev="\${COMP_WORDS[COMP_CWORD-1]}"

    local commands="${commands} ${names}"

    case "\${prev}" in
        completion)
            COMPREPLY=( $(compgen -W "${SHELLS.join(' ')}" -- "\${cur}") )
            return 0
            ;;
        remove)
            COMPREPLY=( $(compgen -W "${names}" -- "\${cur}") )
            return 0
            ;;
    esac

    COMPREPLY=( $(compgen -W "\${commands} --global" -- "\${cur}") )
    return 0
}

complete -F _git_usr ${BIN}

# Installation: add this to ~/.bashrc or ~/.bash_completion,
# or save it to /etc/bash_completion.d/${BIN}`;
}

export function zshCompletion(profiles: string[]): string {
  const commandSpecs = COMMANDS.map(([name, description]) => `        '${name}:${description}'`).join('\n');
  return `#compdef ${BIN}

_git_usr() {
    local -a commands profiles
    commands=(
${commandSpecs}
    )

    profiles=(${profiles.join(' ')})

    _arguments -C \\
        '1: :->command' \\
        '2: :->args' \\
        '*::arg:->args' \\
        '--global[Apply globally]'

    case $state in
        command)
            _describe -t commands '${BIN} commands' commands
            _describe -t profiles 'profiles' profiles
            ;;
        args)
            case $words[1] in
                completion)
                    _values 'shell' ${SHELLS.join(' ')}
                    ;;
                remove)
                    _describe -t profiles 'profiles' profiles
                    ;;
            esac
            ;;
    esac
}

_git_usr "$@"

# Installation: save to a file in $fpath, e.g. ~/.zsh/completions/_${BIN},
# then add to ~/.zshrc: fpath=(~/.zsh/completions $fpath) && autoload -U compinit && compinit`;
}

export function fishCompletion(profiles: string[]): string {
  const lines: string[] = [`# fish completion for ${BIN}`, '', '# Commands'];
  for (const [name, description] of COMMANDS) {
    lines.push(`complete -c ${BIN} -f -n "__fish_use_subcommand" -a "${name}" -d "${description}"`);
  }
  lines.push('', '# Profiles');
  for (const profile of profiles) {
    lines.push(`complete -c ${BIN} -f -n "__fish_use_subcommand" -a "${profile}" -d "Switch to ${profile} profile"`);
  }
  lines.push('', '# Shells for the completion command');
  lines.push(`complete -c ${BIN} -f -n "__fish_seen_subcommand_from completion" -a "${SHELLS.join(' ')}"`);
  lines.push('', '# Profiles for the remove command');
  for (const profile of profiles) {
    lines.push(`complete -c ${BIN} -f -n "__fish_seen_subcommand_from remove" -a "${profile}"`);
  }
  lines.push('', '# Global flag');
  lines.push(`complete -c ${BIN} -l global -d "Apply globally"`);
  lines.push('', `# Installation: save to ~/.config/fish/completions/${BIN}.fish`);
  return lines.join('\n');
}

export function powershellCompletion(profiles: string[]): string {
  const quote = (values: readonly string[]) => values.map((value) => `'${value.replace(/'/g, "''")}'`).join(', ');
  return `# PowerShell completion for ${BIN}

Register-ArgumentCompleter -Native -CommandName ${BIN} -ScriptBlock {
    param($wordToComplete, $commandAst, $cursorPosition)

    $commands = @(${quote(COMMANDS.map(([name]) => name))})
    $profiles = @(${quote(profiles)})
    $shells = @(${quote(SHELLS)})

    $tokens = $commandAst.ToString() -split '\\s+'

    if ($tokens.Count -eq 2) {
        $allOptions = $commands + $profiles + @('--global')
        $allOptions | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {
            [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)
        }
    }
    elseif ($tokens.Count -eq 3) {
        switch ($tokens[1]) {
            'completion' {
                $shells | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {
                    [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)
                }
            }
            'remove' {
                $profiles | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {
                    [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)
                }
            }
        }
    }
}

# Installation: add this to your PowerShell profile ($PROFILE),
# or dot-source it: . path\\to\\${BIN}-completion.ps1`;
}
