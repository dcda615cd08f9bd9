import { readFile } from 'fs/promises';
import path from 'path';
import { PermanentActivityError } from '@contentreview/core';

export interface PayloadResolver {
  resolve(payloadRef: string): Promise<string>;
}

export const PAYLOAD_NOT_FOUND = 'PAYLOAD_NOT_FOUND';
export const PAYLOAD_OUTSIDE_ROOT = 'PAYLOAD_OUTSIDE_ROOT';

const MAX_PAYLOAD_CHARS = 100_000;

/** Reads payload references as paths relative to a root directory. */
export class FilePayloadResolver implements PayloadResolver {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  locate(payloadRef: string): string {
    const target = path.resolve(this.root, payloadRef.replace(/^file:\/\//, ''));
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new PermanentActivityError(
        `Payload reference ${payloadRef} points outside the payload root`,
        PAYLOAD_OUTSIDE_ROOT
      );
    }
    return target;
  }

  async resolve(payloadRef: string): Promise<string> {
    const target = this.locate(payloadRef);

    let text: string;
    try {
      text = await readFile(target, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new PermanentActivityError(`Payload ${payloadRef} not found`, PAYLOAD_NOT_FOUND);
      }
      throw error;
    }

    return text.length > MAX_PAYLOAD_CHARS ? text.slice(0, MAX_PAYLOAD_CHARS) : text;
  }
}
