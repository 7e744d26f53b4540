import { randomInt } from 'node:crypto';
import { existsSync, readFileSync, statSync } from 'node:fs';
import mime from 'mime-types';
import { IllegalArgumentError, type UploadFile } from './types.js';

const SUFFIX_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

function randomSuffix(length = 10): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  }
  return suffix;
}

/**
 * prepareUpload — resolves bytes, MIME type and upload file name for a media post.
 *
 * `media` is either a path to an existing file (type guessed from its name) or the raw
 * bytes, which then need an explicit `mimeType`. The server only sees a generated name
 * of the form `upload_<ms>_<suffix>.<ext>`.
 */
export function prepareUpload(
  media: string | Uint8Array,
  mimeType?: string,
  now: number = Date.now(),
): UploadFile {
  let data: Uint8Array;
  let type = mimeType;

  if (typeof media === 'string') {
    if (!existsSync(media) || !statSync(media).isFile()) {
      throw new IllegalArgumentError(`Media file ${media} does not exist`);
    }
    const guessed = mime.lookup(media);
    type = guessed === false ? undefined : guessed;
    data = readFileSync(media);
  } else {
    data = media;
  }

  if (!type) {
    throw new IllegalArgumentError(
      'Could not determine mime type or data passed directly without mime type',
    );
  }

  const extension = mime.extension(type);
  const fileName = `upload_${now}_${randomSuffix()}${extension ? `.${extension}` : ''}`;
  return { fileName, mimeType: type, data };
}
