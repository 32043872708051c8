import path from 'path';
import { runOrThrow, type ToolRunner } from '../shared/exec.js';

export interface AssetTrackingStatus {
  tracked: boolean;
  // Working tree differs from the committed content.
  modified: boolean;
}

/**
 * Where the "original" bytes of a pinned certificate live. Nothing is cached
 * locally; restore() always goes back to this source.
 */
export interface OriginalAssetSource {
  restore(assetPath: string): Promise<void>;
  describe(assetPath: string): Promise<AssetTrackingStatus>;
}

// Commands run from the file's directory so the app root may sit anywhere inside a larger repo.
export class GitOriginalAssetSource implements OriginalAssetSource {
  constructor(
    private readonly runner: ToolRunner,
    private readonly git = 'git'
  ) {}

  async restore(assetPath: string): Promise<void> {
    await runOrThrow(this.runner, {
      command: this.git,
      args: ['checkout', '--', path.basename(assetPath)],
      cwd: path.dirname(assetPath),
    });
  }

  async describe(assetPath: string): Promise<AssetTrackingStatus> {
    const cwd = path.dirname(assetPath);
    const file = path.basename(assetPath);

    const lsFiles = await this.runner.run({ command: this.git, args: ['ls-files', '--error-unmatch', '--', file], cwd });
    if (lsFiles.exitCode !== 0) return { tracked: false, modified: false };

    const status = await runOrThrow(this.runner, {
      command: this.git,
      args: ['status', '--porcelain', '--', file],
      cwd,
      captureStdout: true,
    });
    return { tracked: true, modified: status.stdout.trim() !== '' };
  }
}
