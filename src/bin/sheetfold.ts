#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from '../cli';

dotenv.config();

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('[CLI] Fatal error', error);
        process.exitCode = 1;
    });
