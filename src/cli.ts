import { parseArgs } from 'util';
import { logger } from './config/logger';
import {
  buildPmsSettings,
  buildServerSettings,
  type PmsSettings,
  type ServerSettings,
} from './config/settings';
import { startHttpServer, startStdioServer } from './mcp/transports';
import { buildHealthSnapshot } from './services/health.service';
import {
  isProcessAlive,
  processKill,
  readPid,
  removePid,
  writePid,
  type KillFn,
} from './services/pidfile.service';
import pkg from '../package.json';

export const USAGE = `Usage: ${pkg.name} <command> [options]

Commands:
  start      Start the MCP server (stdio by default)
  stop       Stop the server recorded in the pid file
  status     Report whether the recorded server is running
  health     Print a health snapshot as JSON
  version    Print the version

Options:
  --http     Serve MCP over HTTP instead of stdio (start only)
  -h, --help Show this help`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliOptions {
  io?: CliIo;
  settings?: PmsSettings;
  server?: ServerSettings;
  /** Signals the recorded server; process.kill unless overridden. */
  kill?: KillFn;
}

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Runs one CLI command and resolves to the process exit code.
 * `start` resolves once the server is listening; the open transport keeps
 * the process alive until SIGINT/SIGTERM.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const command = positionals[0];

  if (values.help || command === undefined) {
    io.out(USAGE);
    return values.help ? 0 : 1;
  }

  const settings = options.settings ?? buildPmsSettings();
  const server = options.server ?? buildServerSettings();
  const kill = options.kill ?? processKill;

  switch (command) {
    case 'health':
      io.out(JSON.stringify(buildHealthSnapshot(settings), null, 2));
      return 0;

    case 'version':
      io.out(`${pkg.name} ${pkg.version}`);
      return 0;

    case 'start': {
      const useHttp = values.http === true || server.enableHttpTransport;

      const close = useHttp
        ? await startHttp(settings, server)
        : await startStdio(settings);
      writePid(server.pidFile, process.pid);
      registerShutdown(async () => {
        removePid(server.pidFile);
        await close();
      });
      return 0;
    }

    case 'stop': {
      const pid = runningPid(server.pidFile, kill);
      if (pid === null) {
        io.err(`${pkg.name} is not running`);
        return 1;
      }
      kill(pid, 'SIGTERM');
      removePid(server.pidFile);
      io.out(`Sent SIGTERM to ${pkg.name} (pid ${pid})`);
      return 0;
    }

    case 'status': {
      const pid = runningPid(server.pidFile, kill);
      if (pid === null) {
        io.out(`${pkg.name} is not running`);
        return 1;
      }
      io.out(`${pkg.name} is running (pid ${pid})`);
      return 0;
    }

    default:
      io.err(`Unknown command: ${command}`);
      io.err(USAGE);
      return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      http: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Pid of a live server, clearing a pid file left behind by a dead one. */
function runningPid(pidFile: string, kill: KillFn): number | null {
  const pid = readPid(pidFile);
  if (pid === null) return null;
  if (isProcessAlive(pid, kill)) return pid;
  removePid(pidFile);
  return null;
}

async function startStdio(settings: PmsSettings): Promise<() => Promise<void>> {
  const server = await startStdioServer(settings);
  return () => server.close();
}

async function startHttp(
  settings: PmsSettings,
  server: ServerSettings,
): Promise<() => Promise<void>> {
  const app = await startHttpServer(settings, server);
  return () => app.close();
}

function registerShutdown(shutdown: () => Promise<void>): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}
