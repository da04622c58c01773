#!/usr/bin/env tsx
import { createProgram } from './cli';

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error('Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
