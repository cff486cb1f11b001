#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli/run';
import { loadSettings } from './config/settings';
import { buildServices } from './services';
import { errorMessage } from './utils/errors';

dotenv.config();

runCli(
  process.argv.slice(2),
  {
    input: process.stdin,
    stdout: text => process.stdout.write(`${text}\n`),
    stderr: text => process.stderr.write(`${text}\n`),
  },
  // No database connection in the CLI; the session cache lives in memory
  () => buildServices(loadSettings(process.env), { store: null }).pipeline
)
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
