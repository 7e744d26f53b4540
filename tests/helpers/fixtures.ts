// tests/helpers/fixtures.ts — Minimal API entities for scripted responses.

export function makeAccount(overrides: Record<string, unknown> = {}) {
  return {
    id: '1',
    username: 'alice',
    acct: 'alice',
    display_name: 'Alice',
    note: '<p>Hi there</p>',
    url: 'https://example.social/@alice',
    followers_count: 3,
    following_count: 4,
    statuses_count: 5,
    ...overrides,
  };
}

export function makeStatus(overrides: Record<string, unknown> = {}) {
  return {
    id: '100',
    uri: 'https://example.social/users/alice/statuses/100',
    url: 'https://example.social/@alice/100',
    account: makeAccount(),
    content: '<p>Hello world</p>',
    created_at: '2026-01-01T00:00:00.000Z',
    in_reply_to_id: null,
    reblog: null,
    reblogs_count: 0,
    favourites_count: 1,
    media_attachments: [],
    ...overrides,
  };
}

export function makeRelationship(overrides: Record<string, unknown> = {}) {
  return {
    id: '7',
    following: true,
    followed_by: false,
    blocking: false,
    ...overrides,
  };
}
