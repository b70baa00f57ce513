#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import Dotenv from 'dotenv';
import { loadConfig, requireSecretKey } from './config';
import { describeError } from './errors';
import { DriverLookupServer } from './server';
import { buildLookupUrl, signToken } from './token';

Dotenv.config();

async function serve(options: { port?: number; logFile?: string; logLevel?: string }) {
  const config = loadConfig(process.env, {
    port: options.port,
    logFilePath: options.logFile ? path.resolve(options.logFile) : undefined,
    logLevel: options.logLevel,
  });

  const server = new DriverLookupServer(config);
  server.installShutdownHandlers();
  await server.start();
}

function sign(options: { doc: string; baseUrl?: string }) {
  const token = signToken(options.doc, requireSecretKey(process.env));
  console.log(token);
  if (options.baseUrl) {
    console.log(buildLookupUrl(options.baseUrl, options.doc, token));
  }
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('driver-lookup')
    .command(
      ['serve', '$0'],
      'Start the driver lookup HTTP server',
      (yargs) => {
        return yargs
          .option('port', {
            alias: 'p',
            type: 'number',
            description: 'Port to listen on (overrides PORT)',
          })
          .option('log-file', {
            alias: 'l',
            type: 'string',
            description: 'Path to log file (overrides LOG_FILE)',
          })
          .option('log-level', {
            type: 'string',
            description: 'winston log level (overrides LOG_LEVEL)',
          });
      },
      async (argv) => {
        await serve({ port: argv.port, logFile: argv.logFile, logLevel: argv.logLevel });
      }
    )
    .command(
      'sign <doc>',
      'Print the access token for an identifier',
      (yargs) => {
        return yargs
          .positional('doc', {
            describe: 'Driver identifier (DNI / CE)',
            type: 'string',
            demandOption: true,
          })
          .option('base-url', {
            alias: 'u',
            type: 'string',
            description: 'Public server URL; also prints the full lookup link',
          });
      },
      (argv) => {
        sign({ doc: argv.doc, baseUrl: argv.baseUrl });
      }
    )
    .strict()
    .help()
    .alias('help', 'h')
    .parseAsync();
}

main().catch((error) => {
  console.error('Failed to start:', describeError(error));
  process.exit(1);
});
