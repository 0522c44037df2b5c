#!/usr/bin/env node
import { createCli } from './cli.js';
import { fail } from './utils/output.js';

createCli().parseAsync(process.argv).catch(fail);
