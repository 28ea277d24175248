import type { Migration } from '../migrations.js';
import { migration001UsersAndMemories } from './long-term/001-users-and-memories.js';
import { migration001SessionCheckpoints } from './checkpoints/001-session-checkpoints.js';

export const longTermMigrations: Migration[] = [migration001UsersAndMemories];

export const checkpointMigrations: Migration[] = [migration001SessionCheckpoints];
