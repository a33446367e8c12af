/**
 * Users table (v1)
 *
 * Accounts sign in with an emailed one-time code, so the code and its expiry live on
 * the user row.
 */

import type { Migration } from '@daybook/core';

export const migration001CreateUsers: Migration = {
   version: 1,
   description: 'Create users table',
   up(db): void {
      db.exec(`
         CREATE TABLE users (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            email TEXT NOT NULL UNIQUE,
            first_name TEXT,
            last_name TEXT,
            one_time_code TEXT,
            one_time_code_expiry TEXT,
            created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
            updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
         )
      `);

      db.exec('CREATE INDEX idx_users_email ON users(email)');
      db.exec('CREATE INDEX idx_users_one_time_code ON users(one_time_code)');
   },
   down(db): void {
      db.exec('DROP TABLE IF EXISTS users');
   },
};
