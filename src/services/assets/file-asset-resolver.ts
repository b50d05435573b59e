import fs from 'fs';
import path from 'path';
import { logger } from '../../config/logger';
import { AssetResolutionError } from '../../utils/errors';
import type { AssetResolver } from './asset-resolver.interface';

/**
 * Lookup order under the assets root. The bare id comes first, so an id like
 * "sfx/door.wav" or "door.wav" both work.
 */
export const ASSET_SEARCH_DIRS = ['', 'sfx', 'music', 'ambience'] as const;

export function assetSearchPaths(root: string, assetId: string): string[] {
  return ASSET_SEARCH_DIRS.map((dir) => path.join(root, dir, assetId));
}

/** Resolves asset ids against the local asset tree; first existing path wins. */
export class FileAssetResolver implements AssetResolver {
  async resolve(root: string, assetId: string): Promise<string> {
    const candidates = assetSearchPaths(root, assetId);
    const found = candidates.find((candidate) => fs.existsSync(candidate));

    if (!found) {
      throw new AssetResolutionError(assetId, candidates);
    }

    logger.debug(`Asset resolved: ${assetId} -> ${found}`);
    return found;
  }
}

export default new FileAssetResolver();
