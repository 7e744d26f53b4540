import { existsSync, readFileSync, statSync } from 'node:fs';
import { IllegalArgumentError, type Credentials } from './types.js';

export interface CredentialInput {
  // A literal client id, or a path to a file holding "client_id\nclient_secret\n"
  clientId: string;
  clientSecret?: string;
  // A literal token, or a path to a file holding "access_token\n"
  accessToken?: string;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function readLines(path: string): string[] {
  return readFileSync(path, 'utf8')
    .split('\n')
    .map((line) => line.trimEnd());
}

/**
 * resolveCredentials — resolves client id / secret / access token, reading files where given.
 *
 * A credentials file replaces both the client id and the secret; an explicitly passed
 * secret is then ignored. The token file is resolved independently.
 */
export function resolveCredentials(input: CredentialInput): Credentials {
  let clientId = input.clientId;
  let clientSecret = input.clientSecret;

  if (isFile(input.clientId)) {
    const [id = '', secret = ''] = readLines(input.clientId);
    if (!id || !secret) {
      throw new IllegalArgumentError(
        `Client credentials file ${input.clientId} must contain the client id and secret on two lines`,
      );
    }
    clientId = id;
    clientSecret = secret;
  } else if (clientSecret === undefined) {
    throw new IllegalArgumentError('Specified client id directly, but did not supply secret');
  }

  let accessToken = input.accessToken;
  if (accessToken !== undefined && isFile(accessToken)) {
    accessToken = readLines(accessToken)[0] ?? '';
  }

  return { clientId, clientSecret, accessToken };
}
