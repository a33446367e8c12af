/**
 * Phone number on users (v2)
 *
 * Incoming calls and texts are matched to an account by phone number.
 */

import type { Migration } from '@daybook/core';

export const migration002AddPhoneNumber: Migration = {
   version: 2,
   description: 'Add phone_number to users',
   up(db): void {
      db.exec('ALTER TABLE users ADD COLUMN phone_number TEXT');
      db.exec('CREATE INDEX idx_users_phone_number ON users(phone_number)');
   },
   down(db): void {
      // SQLite refuses to drop an indexed column
      db.exec('DROP INDEX IF EXISTS idx_users_phone_number');
      db.exec('ALTER TABLE users DROP COLUMN phone_number');
   },
};
