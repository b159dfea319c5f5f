#!/usr/bin/env node
import 'reflect-metadata';
import { buildProgram } from './presentation/cli/program';
import { Logger } from './shared/logger/Logger';

async function main() {
    await buildProgram().parseAsync(process.argv);
}

main().catch(err => {
    Logger.getInstance().error('Screener failed', err);
    process.exit(1);
});
