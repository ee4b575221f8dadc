#!/usr/bin/env tsx
import { main } from './index.js';

// `serve` keeps the process alive after main() resolves
process.exitCode = await main(process.argv.slice(2));
