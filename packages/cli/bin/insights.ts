#!/usr/bin/env -S node --import tsx
import { program } from '../src/index.js';

await program.parseAsync();
