/**
 * Command-line argument parsing.
 *
 * Pure: returns what it found and any problems, never exits the process.
 */

import * as path from 'path';
import { ConfigOverrides } from './config';

export type ListFilter = 'all' | 'favorites' | 'non-favorites';

export interface ParsedArgs {
  configPath?: string;
  overrides: ConfigOverrides;
  list?: ListFilter;
  help: boolean;
  errors: string[];
}

export const USAGE = [
  '  Usage: mesh-monitor [options]',
  '',
  '  Options:',
  '    --config, -c <path>        Path to config YAML file (default ./config.yml)',
  '    --profile <name>           Load config.<name>.yml from the working directory',
  '    --mode <oneshot|continuous>  Sample once and print, or keep sampling (default continuous)',
  '    --interval <seconds>       Seconds between samples in continuous mode (default 30)',
  '    --tcp-host <host>          Gateway host (default 192.168.0.114)',
  '    --tcp-port <port>          Gateway TCP port (default 4403)',
  '    --serial-port <path>       Try this serial device first, TCP as fallback',
  '    --data-dir <path>          Where history files are written (default ./data)',
  '    --http-port <port>         Serve the JSON API on this port',
  '    --list <all|favorites|non-favorites>  One-shot: print a node listing instead of the metrics table',
  '    --verbose, -v              Debug logging',
  '    --help, -h                 Show this help',
].join('\n');

function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : null;
}

export function parseArgs(argv: string[], cwd: string = process.cwd()): ParsedArgs {
  const result: ParsedArgs = { overrides: {}, help: false, errors: [] };
  const { overrides, errors } = result;

  let i = 2;
  while (i < argv.length) {
    const arg = argv[i++];
    const next = (): string | undefined => {
      const value = argv[i];
      if (value === undefined || value.startsWith('--')) {
        errors.push(`${arg} requires a value`);
        return undefined;
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--config':
      case '-c': {
        const value = next();
        if (value !== undefined) result.configPath = path.resolve(cwd, value);
        break;
      }
      case '--profile': {
        const name = next();
        if (name !== undefined) result.configPath = path.join(cwd, `config.${name}.yml`);
        break;
      }
      case '--mode': {
        const value = next();
        if (value === 'oneshot' || value === 'continuous') overrides.mode = value;
        else if (value !== undefined) errors.push(`--mode must be oneshot or continuous, got "${value}"`);
        break;
      }
      case '--interval': {
        const value = next();
        if (value === undefined) break;
        const seconds = Number(value);
        if (Number.isFinite(seconds) && seconds > 0) overrides.intervalSeconds = seconds;
        else errors.push(`--interval must be a positive number of seconds, got "${value}"`);
        break;
      }
      case '--tcp-host': {
        const value = next();
        if (value !== undefined) overrides.tcpHost = value;
        break;
      }
      case '--tcp-port': {
        const value = next();
        if (value === undefined) break;
        const port = parsePort(value);
        if (port !== null) overrides.tcpPort = port;
        else errors.push(`--tcp-port must be 1-65535, got "${value}"`);
        break;
      }
      case '--serial-port': {
        const value = next();
        if (value !== undefined) overrides.serialPort = value;
        break;
      }
      case '--data-dir': {
        const value = next();
        if (value !== undefined) overrides.dataDir = path.resolve(cwd, value);
        break;
      }
      case '--http-port': {
        const value = next();
        if (value === undefined) break;
        const port = parsePort(value);
        if (port !== null) overrides.httpPort = port;
        else errors.push(`--http-port must be 1-65535, got "${value}"`);
        break;
      }
      case '--list': {
        const value = next();
        if (value === 'all' || value === 'favorites' || value === 'non-favorites') result.list = value;
        else if (value !== undefined) errors.push(`--list must be all, favorites or non-favorites, got "${value}"`);
        break;
      }
      case '--verbose':
      case '-v':
        overrides.verbose = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        errors.push(`Unknown option: ${arg}`);
    }
  }

  return result;
}
