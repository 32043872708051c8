import fs from 'fs/promises';
import { MalformedCertificateError, PinswapError, PinswapErrorCode } from '../shared/errors.js';

export type CertificateEncoding = 'DER' | 'PEM';

export interface CertificateAsset {
  readonly path: string;
  readonly encoding: CertificateEncoding;
  readonly content: Buffer;
}

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----([\s\S]*?)-----END CERTIFICATE-----/;
const ASN1_SEQUENCE = 0x30;

// Returns null when the content looks like neither encoding.
export function detectEncoding(content: Buffer): CertificateEncoding | null {
  if (PEM_BLOCK.test(content.toString('latin1'))) return 'PEM';
  if (content[0] === ASN1_SEQUENCE) return 'DER';
  return null;
}

/**
 * Structural check only: the outer DER SEQUENCE must span the buffer, and a PEM
 * file must hold a certificate block whose body decodes to such a SEQUENCE.
 * Returns the reason it failed, or null.
 */
export function checkStructure(content: Buffer, encoding: CertificateEncoding): string | null {
  if (encoding === 'PEM') {
    const match = PEM_BLOCK.exec(content.toString('latin1'));
    if (!match) return 'no BEGIN/END CERTIFICATE block';
    const body = match[1].replace(/\s+/g, '');
    if (!/^[A-Za-z0-9+/]+={0,2}$/.test(body)) return 'certificate block is not base64';
    return checkStructure(Buffer.from(body, 'base64'), 'DER');
  }

  if (content.length < 2 || content[0] !== ASN1_SEQUENCE) return 'does not start with an ASN.1 SEQUENCE';
  const first = content[1];
  let length: number;
  let header: number;
  if (first < 0x80) {
    length = first;
    header = 2;
  } else {
    const numBytes = first & 0x7f;
    if (numBytes === 0 || numBytes > 4 || content.length < 2 + numBytes) return 'invalid ASN.1 length';
    length = 0;
    for (let i = 0; i < numBytes; i++) {
      length = length * 256 + content[2 + i];
    }
    header = 2 + numBytes;
  }
  if (header + length !== content.length) {
    return `ASN.1 length ${header + length} does not match file size ${content.length}`;
  }
  return null;
}

export async function loadCertificateAsset(path: string, encoding: CertificateEncoding): Promise<CertificateAsset> {
  let content: Buffer;
  try {
    content = await fs.readFile(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new PinswapError(PinswapErrorCode.PINNED_CERT_NOT_FOUND, `Certificate not found: ${path}`, { path });
    }
    throw err;
  }

  const problem = checkStructure(content, encoding);
  if (problem) throw new MalformedCertificateError(path, problem);
  return { path, encoding, content };
}
