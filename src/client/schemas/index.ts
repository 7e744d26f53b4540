/**
 * schemas/index.ts — Re-exports all entity schemas and TypeScript types.
 */

export { IdSchema } from './common.js';
export type { Id } from './common.js';

export { AccountSchema, RelationshipSchema } from './account.js';
export type { Account, Relationship } from './account.js';

export { StatusSchema, ContextSchema } from './status.js';
export type { Status, Context } from './status.js';

export { NotificationSchema } from './notification.js';
export type { Notification } from './notification.js';

export { MediaAttachmentSchema } from './media.js';
export type { MediaAttachment } from './media.js';

export { AppRegistrationSchema, TokenGrantSchema } from './auth.js';
export type { AppRegistration, TokenGrant } from './auth.js';
