import { readFileSync } from 'node:fs';
import { createSecureContext } from 'node:tls';
import { TlsLoadError } from './errors.js';
import type { TlsPaths } from './config.js';

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
}

function readPem(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (err) {
    throw new TlsLoadError(path, err);
  }
}

/** Read the certificate pair and check that it forms a usable secure context. */
export function loadTlsMaterial(paths: TlsPaths): TlsMaterial {
  const cert = readPem(paths.certPath);
  const key = readPem(paths.keyPath);
  try {
    createSecureContext({ cert, key });
  } catch (err) {
    throw new TlsLoadError(`${paths.certPath} + ${paths.keyPath}`, err);
  }
  return { cert, key };
}
