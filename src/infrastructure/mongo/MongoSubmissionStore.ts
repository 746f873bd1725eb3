import type { Collection } from "mongodb";
import type { FormStatus } from "../../core/form/FormStatus";
import type { SubmissionStore } from "../../ports/SubmissionStore";
import type { MongoDbProvider } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type RecordedInstanceDoc = {
  formId: string;
  instanceId: string;
  directory: string;
  recordedAt: Date;
};

/**
 * Dedup store of pulled instances in one collection, keyed by form and
 * instance id. `forForm` hands out views scoped to a single form.
 */
export class MongoSubmissionStore {
  private collection?: Collection<RecordedInstanceDoc>;

  constructor(
    private readonly provider: MongoDbProvider,
    private readonly collectionName = "recorded_instances"
  ) {}

  private async getCollection(): Promise<Collection<RecordedInstanceDoc>> {
    if (this.collection) return this.collection;

    const db = await this.provider.db();
    const col = db.collection<RecordedInstanceDoc>(this.collectionName);
    for (const idx of mongoIndexes.recordedInstances) {
      await col.createIndex({ ...idx.keys }, { ...idx.options });
    }

    this.collection = col;
    return col;
  }

  async hasRecordedInstance(formId: string, instanceId: string): Promise<string | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ formId, instanceId });
    return doc?.directory ?? null;
  }

  async putRecordedInstanceDirectory(formId: string, instanceId: string, directory: string): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { formId, instanceId },
      { $set: { directory, recordedAt: new Date() } },
      { upsert: true }
    );
  }

  forForm(form: FormStatus): SubmissionStore {
    const formId = form.formId;
    return {
      hasRecordedInstance: (instanceId) => this.hasRecordedInstance(formId, instanceId),
      putRecordedInstanceDirectory: (instanceId, directory) =>
        this.putRecordedInstanceDirectory(formId, instanceId, directory),
      // the connection belongs to the provider and outlives the view
      close: () => Promise.resolve()
    };
  }
}
