import { Command, Option } from 'commander';

import { configCommandHandler, SETTABLE_CONFIG_KEYS } from '@/reposync/config.command';
import { LOG_LEVELS } from '@/reposync/lib/logger';
import type { SessionCliOptionsInput } from '@/reposync/options';
import { sessionCommandHandler } from '@/reposync/session.command';
import type { Mode } from '@/reposync/types';

export type PackageInfo = {
  version: string;
  description: string;
};

export type ParseHandlers = {
  session: typeof sessionCommandHandler;
  config: typeof configCommandHandler;
};

const defaultHandlers: ParseHandlers = {
  session: sessionCommandHandler,
  config: configCommandHandler,
};

export const parse = ({
  argv,
  pkg,
  handlers = defaultHandlers,
}: {
  argv: string[];
  pkg: PackageInfo;
  handlers?: ParseHandlers;
}): (() => Promise<void>) => {
  const program = new Command();

  program
    .name('repo-sync')
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'output the current version')
    .option('--target-dir <dir>', 'directory repositories are cloned into (default ~/repos)')
    .option('--source-dir <dir...>', 'directories scanned for local repositories')
    .addOption(new Option('--log-level <level>', 'log verbosity').choices([...LOG_LEVELS]))
    .showSuggestionAfterError()
    .showHelpAfterError();

  const startSession = (mode: Mode) => async (_options: unknown, command: Command) => {
    await handlers.session(mode, command.optsWithGlobals<SessionCliOptionsInput>());
  };

  program.action(startSession('personal'));

  program
    .command('github')
    .description('Browse and clone repositories of a GitHub user or organization')
    .option('--owner <name>', 'owner to list (defaults to the signed-in user)')
    .action(startSession('personal'));

  program
    .command('local')
    .description('Copy repositories found under the source directories')
    .action(startSession('local'));

  program
    .command('template')
    .description('Copy files from a template repository into local repositories')
    .action(startSession('template'));

  const config = program.command('config').description('Inspect and edit the persisted settings');

  config
    .command('show')
    .description('Print the settings file')
    .action(async () => {
      await handlers.config({ kind: 'show' });
    });

  config
    .command('set')
    .description(`Set a setting (${SETTABLE_CONFIG_KEYS.join(', ')})`)
    .argument('<key>', 'setting name')
    .argument('<value>', 'new value')
    .action(async (key: string, value: string) => {
      await handlers.config({ kind: 'set', key, value });
    });

  config
    .command('add-source')
    .description('Add a directory to scan for local repositories')
    .argument('<dir>', 'directory path')
    .action(async (dir: string) => {
      await handlers.config({ kind: 'addSource', dir });
    });

  config
    .command('remove-source')
    .description('Stop scanning a directory for local repositories')
    .argument('<dir>', 'directory path')
    .action(async (dir: string) => {
      await handlers.config({ kind: 'removeSource', dir });
    });

  return async () => {
    await program.parseAsync(argv);
  };
};
