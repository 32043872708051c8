import fs from 'fs/promises';
import path from 'path';
import { checkStructure, detectEncoding, loadCertificateAsset } from '../../../src/certs/asset.js';
import { MalformedCertificateError, PinswapErrorCode } from '../../../src/shared/errors.js';
import { PINNED_DER, makeTempDir, pemFromDer } from '../../helpers/fake-runner.js';

describe('detectEncoding', () => {
  it('recognises PEM and DER content', () => {
    expect(detectEncoding(Buffer.from(pemFromDer(PINNED_DER)))).toBe('PEM');
    expect(detectEncoding(PINNED_DER)).toBe('DER');
  });

  it('returns null for anything else', () => {
    expect(detectEncoding(Buffer.from('not a certificate'))).toBeNull();
  });
});

describe('checkStructure', () => {
  it('accepts a DER SEQUENCE that spans the buffer', () => {
    expect(checkStructure(PINNED_DER, 'DER')).toBeNull();
  });

  it('accepts the long length form', () => {
    expect(checkStructure(Buffer.from([0x30, 0x81, 0x03, 0x02, 0x01, 0x05]), 'DER')).toBeNull();
  });

  it('rejects DER that is not a SEQUENCE', () => {
    expect(checkStructure(Buffer.from([0x02, 0x01, 0x05]), 'DER')).toBe('does not start with an ASN.1 SEQUENCE');
  });

  it('rejects truncated DER', () => {
    expect(checkStructure(Buffer.from([0x30, 0x05, 0x02, 0x01, 0x05]), 'DER')).toBe(
      'ASN.1 length 7 does not match file size 5'
    );
  });

  it('rejects an indefinite length', () => {
    expect(checkStructure(Buffer.from([0x30, 0x80]), 'DER')).toBe('invalid ASN.1 length');
  });

  it('accepts a PEM block wrapping valid DER', () => {
    expect(checkStructure(Buffer.from(pemFromDer(PINNED_DER)), 'PEM')).toBeNull();
  });

  it('rejects PEM without a certificate block', () => {
    expect(checkStructure(Buffer.from('hello'), 'PEM')).toBe('no BEGIN/END CERTIFICATE block');
  });

  it('rejects a PEM block whose body is not base64', () => {
    const pem = '-----BEGIN CERTIFICATE-----\n!!!\n-----END CERTIFICATE-----\n';
    expect(checkStructure(Buffer.from(pem), 'PEM')).toBe('certificate block is not base64');
  });

  it('treats DER bytes as malformed PEM', () => {
    expect(checkStructure(PINNED_DER, 'PEM')).toBe('no BEGIN/END CERTIFICATE block');
  });
});

describe('loadCertificateAsset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a well-formed certificate', async () => {
    const file = path.join(dir, 'pinned.cer');
    await fs.writeFile(file, PINNED_DER);
    const asset = await loadCertificateAsset(file, 'DER');
    expect(asset).toEqual({ path: file, encoding: 'DER', content: PINNED_DER });
  });

  it('reports a missing file as PINNED_CERT_NOT_FOUND', async () => {
    const file = path.join(dir, 'missing.cer');
    await expect(loadCertificateAsset(file, 'DER')).rejects.toMatchObject({
      code: PinswapErrorCode.PINNED_CERT_NOT_FOUND,
      message: `Certificate not found: ${file}`,
    });
  });

  it('rejects content in the wrong encoding', async () => {
    const file = path.join(dir, 'pinned.cer');
    await fs.writeFile(file, pemFromDer(PINNED_DER));
    await expect(loadCertificateAsset(file, 'DER')).rejects.toBeInstanceOf(MalformedCertificateError);
  });
});
