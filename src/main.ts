#!/usr/bin/env node
import { createProgram } from './cli';

createProgram().parseAsync().catch(error => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
