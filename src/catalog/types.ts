export type AssetStatus = "active" | "inactive";

export type AssetRecord = {
  id: number;
  symbol: string;
  name: string;
  slug: string;
  status: AssetStatus;
  createdAt: string;
  statusChangedAt?: string;
};

export type Asset = AssetRecord & {
  firstSeen: string | null;
  lastSeen: string | null;
};

export type AssetMetadata = {
  assetId: number;
  logoUrl?: string | null;
  websiteUrl?: string | null;
  technicalDoc?: string | null;
  description?: string | null;
  category?: string | null;
};

export type CatalogDocument = {
  version: 1;
  nextAssetId: number;
  assets: AssetRecord[];
  metadata: AssetMetadata[];
};

export type NewsSource = {
  id: number;
  name: string;
  baseUrl: string | null;
  description: string | null;
};

export type NewsCategory = {
  id: number;
  name: string;
};
