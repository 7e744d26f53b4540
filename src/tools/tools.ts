/**
 * tools.ts — createTools() factory for the MCP tools.
 *
 * One MastodonClient backs every tool of a server instance, so all tool calls share
 * the session's rate-limit state and policy.
 *
 * Tool pattern:
 *   1. Inputs validated by the zod inputSchema
 *   2. Call the matching client method
 *   3. Return toolSuccess(summary) or classifyError(error)
 *
 * Statuses and accounts are summarized: HTML content becomes Markdown and
 * only the fields an agent needs are kept.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MastodonClient } from '../client/MastodonClient.js';
import { htmlToMarkdown } from '../client/html-to-markdown.js';
import type { Account, Status } from '../client/schemas/index.js';
import { toolSuccess, classifyError } from './errors.js';

export function summarizeStatus(status: Status) {
  const shown = status.reblog ?? status;
  return {
    id: status.id,
    url: shown.url ?? null,
    author: shown.account.acct,
    created_at: shown.created_at,
    content: htmlToMarkdown(shown.content),
    spoiler_text: shown.spoiler_text ?? '',
    reblogged_by: status.reblog ? status.account.acct : null,
    in_reply_to_id: shown.in_reply_to_id ?? null,
    reblogs_count: shown.reblogs_count ?? 0,
    favourites_count: shown.favourites_count ?? 0,
    media: shown.media_attachments.map((m) => ({ id: m.id, type: m.type, url: m.url })),
  };
}

export function summarizeAccount(account: Account) {
  return {
    id: account.id,
    acct: account.acct,
    display_name: account.display_name,
    url: account.url,
    note: htmlToMarkdown(account.note),
    followers_count: account.followers_count ?? null,
    following_count: account.following_count ?? null,
    statuses_count: account.statuses_count ?? null,
  };
}

const idInput = z.string().min(1);

const pageInputs = {
  max_id: idInput.optional().describe('Return results older than this id'),
  since_id: idInput.optional().describe('Return results newer than this id'),
  limit: z.number().int().positive().max(40).optional().describe('Maximum number of results'),
};

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTools(client: MastodonClient): McpServer {
  const server = new McpServer({
    name: 'mastodon-mcp',
    version: '0.1.0',
  });

  server.registerTool(
    'get_timeline',
    {
      description: 'Read a timeline, most recent statuses first. "home" is the authenticated user\'s feed, "mentions" their mentions, "public" the federated timeline. Pass hashtag (without #) to read a tag timeline instead.',
      inputSchema: {
        timeline: z.enum(['home', 'mentions', 'public']).optional().default('home'),
        hashtag: z.string().min(1).optional().describe('Read statuses with this hashtag instead of a named timeline'),
        ...pageInputs,
      },
    },
    async ({ timeline, hashtag, max_id, since_id, limit }) => {
      try {
        const page = { maxId: max_id, sinceId: since_id, limit };
        const statuses = hashtag
          ? await client.timelineHashtag(hashtag.replace(/^#/, ''), page)
          : await client.timeline(timeline, page);
        return toolSuccess(statuses.map(summarizeStatus));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'get_status',
    {
      description: 'Get a single status by id, with its content as markdown.',
      inputSchema: {
        status_id: idInput.describe('The status id'),
      },
    },
    async ({ status_id }) => {
      try {
        return toolSuccess(summarizeStatus(await client.status(status_id)));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'get_status_context',
    {
      description: 'Get the conversation around a status: the statuses it replies to (ancestors) and the replies to it (descendants).',
      inputSchema: {
        status_id: idInput.describe('The status id'),
      },
    },
    async ({ status_id }) => {
      try {
        const context = await client.statusContext(status_id);
        return toolSuccess({
          ancestors: context.ancestors.map(summarizeStatus),
          descendants: context.descendants.map(summarizeStatus),
        });
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'post_status',
    {
      description: 'Publish a status as the authenticated user. Optionally reply to another status or attach previously uploaded media.',
      inputSchema: {
        status: z.string().min(1).describe('The text of the status'),
        in_reply_to_id: idInput.optional().describe('Id of the status being replied to'),
        media_ids: z.array(idInput).max(4).optional().describe('Ids of uploaded media to attach'),
      },
    },
    async ({ status, in_reply_to_id, media_ids }) => {
      try {
        const posted = await client.statusPost(status, {
          inReplyToId: in_reply_to_id,
          mediaIds: media_ids,
        });
        return toolSuccess(summarizeStatus(posted));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'list_notifications',
    {
      description: 'List the authenticated user\'s notifications: mentions, favourites, reblogs and follows.',
      inputSchema: {},
    },
    async () => {
      try {
        const notifications = await client.notifications();
        return toolSuccess(
          notifications.map((n) => ({
            id: n.id,
            type: n.type,
            created_at: n.created_at,
            account: n.account.acct,
            status: n.status ? summarizeStatus(n.status) : null,
          })),
        );
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'get_account',
    {
      description: 'Get an account by id. Omit account_id to get the authenticated user\'s own account.',
      inputSchema: {
        account_id: idInput.optional().describe('The account id'),
      },
    },
    async ({ account_id }) => {
      try {
        const account = account_id
          ? await client.account(account_id)
          : await client.accountVerifyCredentials();
        return toolSuccess(summarizeAccount(account));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'get_account_statuses',
    {
      description: 'List statuses posted by an account, most recent first.',
      inputSchema: {
        account_id: idInput.describe('The account id'),
        ...pageInputs,
      },
    },
    async ({ account_id, max_id, since_id, limit }) => {
      try {
        const statuses = await client.accountStatuses(account_id, {
          maxId: max_id,
          sinceId: since_id,
          limit,
        });
        return toolSuccess(statuses.map(summarizeStatus));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'search_accounts',
    {
      description: 'Search accounts by name or handle. A full "user@domain" handle also finds accounts on other servers.',
      inputSchema: {
        q: z.string().min(1).describe('Search query'),
        limit: z.number().int().positive().max(40).optional().describe('Maximum number of results'),
      },
    },
    async ({ q, limit }) => {
      try {
        const accounts = await client.accountSearch(q, { limit });
        return toolSuccess(accounts.map(summarizeAccount));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  server.registerTool(
    'get_relationships',
    {
      description: 'Show whether the authenticated user follows, is followed by, or blocks each given account.',
      inputSchema: {
        account_ids: z.array(idInput).min(1).describe('Account ids to check'),
      },
    },
    async ({ account_ids }) => {
      try {
        return toolSuccess(await client.accountRelationships(account_ids));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  return server;
}
