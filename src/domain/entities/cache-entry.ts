export interface CachePayloadRef {
  blobKey: string;
  contentType: string;
  sizeBytes: number;
  durationSeconds?: number;
}

export interface CacheEntry {
  id: string; // same as key
  key: string; // fingerprint of the inputs
  namespace: string; // e.g. "tts"
  payloadRef: CachePayloadRef;
  metadata: Record<string, string | number | boolean>;
  hitCount: number;
  lastAccessedAt: Date;
  createdAt: Date;
}
