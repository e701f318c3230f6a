import { gunzipSync, gzipSync } from 'node:zlib';
import { TemplateDocument } from '../assembler/types';
import { TemplateDecodeError } from '../errors';
import { stableStringify } from '../utils/json';
import { isPlainObject } from '../utils/validation';

export type EncodedTemplate = {
  code: string;
  name: string;
};

const isTemplateDocument = (value: unknown): value is TemplateDocument => {
  if (!isPlainObject(value) || !Array.isArray(value.blocks)) {
    return false;
  }
  return value.blocks.every(
    (block: unknown) => isPlainObject(block) && (block.id === 'block' || block.id === 'bracket')
  );
};

/** Serializes with sorted keys so equal documents always encode to the same code. */
export const encodeTemplate = (document: TemplateDocument, name: string): EncodedTemplate => {
  const json = stableStringify(document);
  const code = gzipSync(Buffer.from(json, 'utf-8')).toString('base64');
  return { code, name };
};

export const decodeTemplate = (code: string): TemplateDocument => {
  let json: string;
  try {
    json = gunzipSync(Buffer.from(code.trim(), 'base64')).toString('utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TemplateDecodeError(`Template code is not valid compressed data: ${message}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TemplateDecodeError(`Template code does not contain valid JSON: ${message}`);
  }

  if (!isTemplateDocument(data)) {
    throw new TemplateDecodeError('Template code does not describe a list of code blocks');
  }

  return data;
};
