export interface AssetResolver {
  /** Absolute path of the asset, or rejects with AssetResolutionError. */
  resolve(root: string, assetId: string): Promise<string>;
}
