#!/usr/bin/env node
import { config } from 'dotenv';
import { runCli } from './program.js';

// Load environment variables
config();

process.exitCode = await runCli(process.argv.slice(2));
