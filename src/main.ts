#!/usr/bin/env node
import 'reflect-metadata';
import { runCli } from './cli/run-cli';

async function bootstrap() {
  process.exitCode = await runCli(process.argv.slice(2));
}

void bootstrap();
