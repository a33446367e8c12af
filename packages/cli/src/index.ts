#!/usr/bin/env -S node --import tsx
/**
 * daybook - Apply, roll back and inspect Daybook database migrations
 */

import { createProgram } from './program.ts';

await createProgram().parseAsync();
