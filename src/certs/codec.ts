import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { runOrThrow, type ToolRunner } from '../shared/exec.js';
import { MalformedCertificateError, ToolInvocationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadCertificateAsset, type CertificateAsset, type CertificateEncoding } from './asset.js';

// openssl x509 stderr when the input is not a certificate in the stated -inform.
const PARSE_FAILURE = /unable to load certificate|could not (read|find) certificate|expecting: (trusted )?certificate|asn1|bad base64|no start line|wrong tag|nested asn1 error/i;

export class CertificateCodec {
  constructor(
    private readonly runner: ToolRunner,
    private readonly openssl = 'openssl'
  ) {}

  /**
   * Re-encode `asset.content` into `destinationPath`; `asset.path` is only used in
   * messages. The content is staged next to the destination, and openssl writes a
   * sibling temp file that is renamed over the destination only after a clean exit.
   */
  async convert(
    asset: CertificateAsset,
    targetEncoding: CertificateEncoding,
    destinationPath: string
  ): Promise<CertificateAsset> {
    const stem = path.join(
      path.dirname(destinationPath),
      `.${path.basename(destinationPath)}.${randomBytes(4).toString('hex')}`
    );
    const inPath = `${stem}.in`;
    const tmpPath = `${stem}.tmp`;
    const args = ['x509', '-inform', asset.encoding, '-outform', targetEncoding, '-in', inPath, '-out', tmpPath];

    try {
      await fs.writeFile(inPath, asset.content);
      await runOrThrow(this.runner, { command: this.openssl, args });
      await fs.rename(tmpPath, destinationPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      if (err instanceof ToolInvocationError && err.exitCode !== null && PARSE_FAILURE.test(err.stderr)) {
        throw new MalformedCertificateError(asset.path, err.stderr.trim().split('\n')[0] || 'openssl could not parse it');
      }
      throw err;
    } finally {
      await fs.rm(inPath, { force: true });
    }

    logger.debug({ from: asset.path, to: destinationPath, encoding: targetEncoding }, 'Certificate converted');
    return loadCertificateAsset(destinationPath, targetEncoding);
  }
}
