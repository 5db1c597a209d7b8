#!/usr/bin/env tsx
import { run } from './cli';

process.exitCode = await run(process.argv);
