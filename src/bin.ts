#!/usr/bin/env node
import { run_cli } from './main';

run_cli().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
