import fs from 'fs/promises';
import { InterceptionCertificateMissingError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadCertificateAsset } from './asset.js';
import type { CertificateCodec } from './codec.js';
import type { OriginalAssetSource } from './original-source.js';

/**
 * Puts the interception proxy's CA in place of an app's pinned certificate, and
 * puts the original back. The pinned asset is always DER, whatever encoding the
 * proxy stores its CA in, so substitution goes through the codec rather than a copy.
 */
export class CertificateSubstitutor {
  constructor(
    private readonly codec: CertificateCodec,
    private readonly originals: OriginalAssetSource
  ) {}

  async substitute(pinnedCertPath: string, interceptionCertSourcePath: string): Promise<void> {
    try {
      await fs.access(interceptionCertSourcePath);
    } catch {
      throw new InterceptionCertificateMissingError(interceptionCertSourcePath);
    }

    const interceptionCert = await loadCertificateAsset(interceptionCertSourcePath, 'PEM');
    await this.codec.convert(interceptionCert, 'DER', pinnedCertPath);
    logger.info({ pinnedCertPath, source: interceptionCertSourcePath }, 'Pinned certificate substituted');
  }

  async restore(pinnedCertPath: string): Promise<void> {
    await this.originals.restore(pinnedCertPath);
    logger.info({ pinnedCertPath }, 'Pinned certificate restored');
  }
}
