export function usageText(configPath: string): string {
  return `
git-usr: switch git user profiles

USAGE
  git usr <profile>              Switch to profile (local scope)
  git usr <profile> --global     Switch to profile (global scope)
  git usr list                   List all profiles
  git usr add <profile>          Add/update a profile (interactive)
  git usr add <profile> "Name" "email@example.com"
  git usr remove <profile>       Remove a profile
  git usr current                Show current git config
  git usr completion <shell>     Generate completion script (bash, zsh, fish, powershell)
  git usr version                Show version information
  git usr help                   Show this help

OPTIONS
  --global                       Apply to the global git config instead of this repository
  --json                         Output JSON (list, current)
  --verbose <0-3>                Diagnostic output on stderr

EXAMPLES
  $ git usr work                 # Switch to work profile (local)
  $ git usr personal --global    # Switch to personal profile (global)
  $ git usr add work "Jane Doe" "jane@company.example"
  $ git usr list                 # List all available profiles

Config location: ${configPath}
`;
}

export function versionBanner(version: string): string {
  return `
            __
           / _)
    .-^^^-/ /
 __/       /
<__.|_|-|_|

git-usr version ${version}
`;
}
