import { MongoClient, Db, Collection } from "mongodb";
import { RoomSensorRecord } from "../../types.js";
import { FeatureRow, calendarParts, parseTimestamp } from "../../pipeline/features.js";
import { FeatureStore, InferredRecord, InferredRecordSink } from "../../pipeline/processEvents.js";
import { logger } from "../../utils/logger.js";

export interface MongoStoreConfig {
  uri: string;
  dbName: string;
  featureCollectionName: string;
  inferredCollectionName?: string;
}

export interface FeatureRowDocument extends RoomSensorRecord {
  timestamp_utc: Date;
  created_at: Date;
  Hour: number;
  DayOfWeek: number;
  DayOfYear: number;
}

export interface InferredRecordDocument extends InferredRecord {
  created_at: Date;
}

export interface MongoStore {
  client: MongoClient;
  db: Db;
  featuresCollection: Collection<FeatureRowDocument>;
  inferredCollection: Collection<InferredRecordDocument> | null;
}

let cachedStore: MongoStore | null = null;

async function ensureIndexes(featuresCollection: Collection<FeatureRowDocument>) {
  const indexSpecs: { keys: Record<string, 1 | -1> }[] = [
    { keys: { RoomID: 1, timestamp_utc: -1 } },
    { keys: { timestamp_utc: -1 } }
  ];

  for (const { keys } of indexSpecs) {
    try {
      await featuresCollection.createIndex(keys);
    } catch (err) {
      logger.warn({ err, keys }, "Unable to create MongoDB index; continuing");
    }
  }
}

export async function initMongo(cfg: MongoStoreConfig): Promise<MongoStore> {
  if (cachedStore) return cachedStore;

  const client = new MongoClient(cfg.uri);
  await client.connect();
  const db = client.db(cfg.dbName);
  const featuresCollection = db.collection<FeatureRowDocument>(cfg.featureCollectionName);
  const inferredCollection = cfg.inferredCollectionName
    ? db.collection<InferredRecordDocument>(cfg.inferredCollectionName)
    : null;
  await ensureIndexes(featuresCollection);

  cachedStore = { client, db, featuresCollection, inferredCollection };
  return cachedStore;
}

/** Adds the calendar features the model is trained on; null when the timestamp cannot be read. */
export function toFeatureRowDocument(record: RoomSensorRecord, createdAt: Date): FeatureRowDocument | null {
  const parsed = parseTimestamp(record.Timestamp);
  if (!parsed) return null;
  const parts = calendarParts(parsed);
  return {
    ...record,
    timestamp_utc: parsed.instant,
    created_at: createdAt,
    Hour: parts.hour,
    DayOfWeek: parts.dayOfWeek,
    DayOfYear: parts.dayOfYear
  };
}

export async function insertFeatureRows(store: MongoStore, records: RoomSensorRecord[]): Promise<number> {
  const now = new Date();
  const docs = records
    .map((record) => toFeatureRowDocument(record, now))
    .filter((doc): doc is FeatureRowDocument => doc !== null);
  if (docs.length === 0) return 0;
  const result = await store.featuresCollection.insertMany(docs);
  return result.insertedCount;
}

export async function getLatestFeatureRow(store: MongoStore, roomId: string): Promise<FeatureRow | null> {
  const doc = await store.featuresCollection.findOne(
    { RoomID: roomId },
    { sort: { timestamp_utc: -1, _id: -1 }, projection: { _id: 0, created_at: 0, timestamp_utc: 0 } }
  );
  return doc ? { ...doc } : null;
}

export function createMongoFeatureStore(store: MongoStore): FeatureStore {
  return {
    getLatestRoomRecord: (roomId) => getLatestFeatureRow(store, roomId)
  };
}

export function createMongoInferredSink(store: MongoStore): InferredRecordSink | undefined {
  const collection = store.inferredCollection;
  if (!collection) return undefined;
  return {
    async enqueue(record: InferredRecord): Promise<void> {
      await collection.insertOne({ ...record, created_at: new Date() });
    }
  };
}

export async function closeMongo(): Promise<void> {
  if (!cachedStore) return;
  await cachedStore.client.close();
  cachedStore = null;
}
