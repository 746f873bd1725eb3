import type { Collection } from "mongodb";
import type { PreferenceStore } from "../../ports/PreferenceStore";
import type { MongoDbProvider } from "./MongoClientFactory";

export type PreferenceDoc = {
  _id: string;
  value: string;
  updatedAt: Date;
};

export class MongoPreferenceStore implements PreferenceStore {
  private collection?: Collection<PreferenceDoc>;

  constructor(
    private readonly provider: MongoDbProvider,
    private readonly collectionName = "preferences"
  ) {}

  private async getCollection(): Promise<Collection<PreferenceDoc>> {
    if (this.collection) return this.collection;
    const db = await this.provider.db();
    this.collection = db.collection<PreferenceDoc>(this.collectionName);
    return this.collection;
  }

  async get(key: string): Promise<string | undefined> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: key });
    return doc?.value;
  }

  async put(key: string, value: string): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne({ _id: key }, { $set: { value, updatedAt: new Date() } }, { upsert: true });
  }

  async remove(key: string): Promise<void> {
    const col = await this.getCollection();
    await col.deleteOne({ _id: key });
  }
}
