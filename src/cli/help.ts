/**
 * @fileoverview Help text for ghj commands
 */

const HELP_TEXT = {
  main: `
ghj - jump to GitHub repositories and organizations from the terminal

USAGE:
    ghj [command] [options]

COMMANDS:
    search              Interactive fuzzy search (default when no command is given)
    query <text>        Print ranked matches without the interactive UI
    open                Open the current repository in the browser
    issues              Open the current repository's issues
    prs, pulls          Open the current repository's pull requests
    actions             Open the current repository's Actions tab
    milestones          Open the current repository's milestones
    settings            Open the current repository's settings
    watch action        Follow the latest CI run for the current branch
    data <subcommand>   Manage the local cache (refresh, clear, status, export, reveal)
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --verbose           Log debug output to stderr
    --json              Print results and errors as JSON

ENVIRONMENT:
    GITHUB_TOKEN        Token used for refresh and watch
    GHJUMP_HOME         Directory holding config.yaml and the cache
    GHJUMP_WEB_URL      Web base URL (default https://github.com)
    GHJUMP_API_URL      API base URL (default https://api.github.com)
    GHJUMP_LOG_LEVEL    silent, error, warn, info or debug (default warn)

EXAMPLES:
    ghj data refresh
    ghj
    ghj query blog --count 3
    ghj watch action
`,

  search: `
ghj search - Interactive fuzzy search

USAGE:
    ghj [search]

Type to filter organizations and repositories. Results are ordered by match
quality, then by how often and how recently you opened them.

KEYS:
    Enter               Open the selected entry
    Ctrl+T              Open its issues
    Ctrl+P              Open its pull requests
    Ctrl+A              Open its Actions tab
    Ctrl+G              Open its milestones
    Up/Down, Ctrl+K/J   Move the selection
    Ctrl+U              Clear the query
    Esc, Ctrl+C, Ctrl+D Quit without opening anything
`,

  query: `
ghj query - Print ranked matches

USAGE:
    ghj query <text> [options]

OPTIONS:
    --count <n>         Number of results (default 10)
    --json              Print {"items": [...]} for launcher integrations

EXAMPLES:
    ghj query gg
    ghj query api --count 1 --json
`,

  open: `
ghj open | issues | prs | pulls | actions | milestones | settings

USAGE:
    ghj <view> [options]

Opens a view of the repository the current directory belongs to. The
repository is read from the "origin" remote.

OPTIONS:
    --print             Print the URL instead of opening it
`,

  watch: `
ghj watch action - Follow the latest CI run

USAGE:
    ghj watch action [options]

Finds the latest workflow run for the current branch (the cached default
branch on a detached HEAD) and polls it until it completes. Polling backs
off from 2s to 30s. Ctrl+C stops watching.

OPTIONS:
    --branch <name>     Watch this branch instead of the current one
    --no-open           Do not open the run page when it completes
    --timeout <sec>     Give up after this many seconds (default 1800)
`,

  data: `
ghj data - Manage the local cache

USAGE:
    ghj data <subcommand> [options]

SUBCOMMANDS:
    refresh             Replace cached organizations and repositories with GitHub's
    clear               Delete all cached data and usage history
    status              Show counts, last refresh time and file size
    export              Print the whole cache as JSON
    reveal              Print the cache file path

OPTIONS:
    --quiet             status: print one JSON line; refresh: no progress output
`,
} satisfies Record<string, string>;

export type HelpTopic = keyof typeof HELP_TEXT;

const ALIASES: Record<string, HelpTopic> = {
  issues: 'open',
  prs: 'open',
  pulls: 'open',
  actions: 'open',
  milestones: 'open',
  settings: 'open',
};

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getCommandHelp(command?: string): string {
  if (!command) return HELP_TEXT.main;
  const topic = isHelpTopic(command) ? command : ALIASES[command];
  return topic ? HELP_TEXT[topic] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command) && !ALIASES[command]) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
