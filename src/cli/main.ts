#!/usr/bin/env node
import { main } from './demo.js';

process.exitCode = await main(process.argv.slice(2));
