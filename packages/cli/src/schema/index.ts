/**
 * Journal schema registry - every migration of the Daybook database, in order.
 *
 * When adding a migration:
 * 1. Create a new file in this directory (e.g., 005-add-entries.ts)
 * 2. Import it and append it to the list below
 * Never renumber or remove a migration that has shipped.
 */

import { MigrationRegistry } from '@daybook/core';
import { migration001CreateUsers } from './001-create-users.ts';
import { migration002AddPhoneNumber } from './002-add-phone-number.ts';
import { migration003AddApproved } from './003-add-approved.ts';
import { migration004ApprovalStatus } from './004-approval-status.ts';

export { APPROVAL_STATUSES } from './004-approval-status.ts';
export type { ApprovalStatus } from './004-approval-status.ts';

export const journalMigrations = [
   migration001CreateUsers,
   migration002AddPhoneNumber,
   migration003AddApproved,
   migration004ApprovalStatus,
];

export function createJournalRegistry(): MigrationRegistry {
   return new MigrationRegistry(journalMigrations);
}
