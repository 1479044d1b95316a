import { Command, CommanderError } from 'commander';
import { resolveConfig } from './config';
import { generateIdmap } from './core';
import { NoInputError, isIdmapError } from './errors';
import { renderJson, renderText } from './render';

export const VERSION = '0.1.0';

type OutputMode = 'text' | 'json';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

interface CliOptions {
  user: string[];
  group: string[];
  owner?: string;
  confDir?: string;
  vmid?: string;
  json?: boolean;
}

function toOutputMode(opts: { json?: boolean }): OutputMode {
  return opts.json ? 'json' : 'text';
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

export function createProgram(io: CliIO = processIO, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();
  program
    .name('lxc-idmap')
    .description('Generate lxc.idmap lines and /etc/subuid, /etc/subgid entries for unprivileged LXC containers.')
    .version(VERSION, '-v, --version', 'Show version')
    .helpOption('-h, --help', 'Show help')
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({ writeOut: (str) => io.stdout(str), writeErr: (str) => io.stderr(str) })
    .argument(
      '[mappings...]',
      'lxc_uid[:lxc_gid][=host_uid[:host_gid]]; maps a uid and a gid. gid defaults to the uid, host ids to the container ids.'
    )
    .option('-u, --user <id[=host_id]>', 'Map a single container uid (no gid mapping). Repeatable.', collect, [])
    .option('-g, --group <id[=host_id]>', 'Map a single container gid (no uid mapping). Repeatable.', collect, [])
    .option('-o, --owner <name>', 'Host account for /etc/subuid and /etc/subgid lines (default: $LXC_IDMAP_OWNER or root)')
    .option('-C, --conf-dir <dir>', 'Container config directory shown in the header (default: $LXC_IDMAP_CONF_DIR or /etc/pve/lxc)')
    .option('-i, --vmid <vmid>', 'Container id used in the config file name')
    .option('-j, --json', 'Output JSON', false)
    .action((mappings: string[] | undefined, opts: CliOptions) => {
      const config = resolveConfig({ owner: opts.owner, confDir: opts.confDir, vmid: opts.vmid }, env);
      const idmap = generateIdmap({ mappings: mappings ?? [], users: opts.user, groups: opts.group });
      const mode = toOutputMode(opts);
      io.stdout(mode === 'json' ? renderJson(idmap, config) : renderText(idmap, config));
    });
  return program;
}

/** Parse user arguments (no node/script prefix), print the result and return the exit code. */
export function run(argv: readonly string[], io: CliIO = processIO, env: NodeJS.ProcessEnv = process.env): number {
  const program = createProgram(io, env);
  try {
    program.parse([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version exit cleanly; everything else is a usage error
      return err.exitCode === 0 ? 0 : 2;
    }
    if (err instanceof NoInputError) {
      io.stderr(`error: ${err.message}\n`);
      io.stderr(program.helpInformation());
      return 2;
    }
    if (isIdmapError(err)) {
      io.stderr(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
