/**
 * Message part constructors
 */

import * as fs from 'fs';
import * as path from 'path';

import type {
  CallPart,
  ImagePart,
  ResultPart,
  TextPart,
} from '../types/conversation.js';

const IMAGE_MEDIA_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export function textPart(text: string): TextPart {
  return { type: 'text', text };
}

export function callPart(
  name: string,
  args: Record<string, unknown>,
  id: string
): CallPart {
  return { type: 'call', name, arguments: args, id };
}

export function resultPart(name: string, id: string, result: string): ResultPart {
  return { type: 'result', name, id, result };
}

/**
 * Guess an image media type from the file extension
 */
export function imageMediaType(filename: string): string {
  const ext = path.extname(filename).toLowerCase();
  return IMAGE_MEDIA_TYPES[ext] ?? 'application/octet-stream';
}

/**
 * Read an image file eagerly into a base64 part
 * Throws when the file cannot be read
 */
export function loadImagePart(filename: string): ImagePart {
  const data = fs.readFileSync(filename).toString('base64');
  return {
    type: 'image',
    filename,
    mediaType: imageMediaType(filename),
    data,
  };
}
