/**
 * CLI help text for global and per-command --help output.
 *
 * Each subcommand help follows a consistent structure:
 *   SYNOPSIS, DESCRIPTION, FLAGS, EXAMPLES
 */

const COMMAND_HELP: Record<string, string> = {
  scan: `
SYNOPSIS
  mutaform scan [FILE...] [--json]

DESCRIPTION
  Parse the configured sources (or the given files) and list every
  mutation site that would run. Provably equivalent mutants are
  excluded and dominated operators are reduced away. Nothing is
  executed and no file is modified.

FLAGS
  --json    Output the site list as JSON

EXAMPLES
  mutaform scan
  mutaform scan src/app/core.clj --json
`.trim(),

  run: `
SYNOPSIS
  mutaform run [--schemata] [--full] [--json]

DESCRIPTION
  Run mutation testing. Coverage is refreshed for stale units, changed
  forms are scanned and each mutant is applied, tested against its
  covering tests and reverted. Results of unchanged forms are reused
  from the previous run. Exits 1 when any mutant survives.

FLAGS
  --schemata    Embed all mutants of a file in one load (see schemata.*)
  --full        Ignore stored state and run every form
  --json        Output the full report as JSON

EXAMPLES
  mutaform run
  mutaform run --schemata
  mutaform run --full --json
`.trim(),

  help: `
SYNOPSIS
  mutaform help [COMMAND]

DESCRIPTION
  Show global help, or help for one command.
`.trim(),
};

export function getCommandHelp(command: string): string | null {
  return COMMAND_HELP[command] ?? null;
}

export function getGlobalHelp(): string {
  return `
Usage: mutaform <command> [options]

Commands:
  scan [FILE...]    List mutation sites without running anything
  run               Run mutation testing and report the score
  help [COMMAND]    Show help

Configuration is read from .mutaform.yml in the working directory.
Run \`mutaform <command> --help\` for command details.
`.trim();
}
