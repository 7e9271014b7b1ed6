#!/usr/bin/env node
import { runMain } from 'citty';
import { createMainCommand } from './cli.js';

runMain(createMainCommand()).catch((err: unknown) => {
  console.error('treehop failed:', err);
  process.exit(1);
});
