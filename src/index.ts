#!/usr/bin/env tsx
/**
 * review-ledger - Report pull-request review decisions from Azure DevOps
 *
 * Entry point for the CLI application
 */

import { createProgram } from './cli';

const program = createProgram();
await program.parseAsync();
