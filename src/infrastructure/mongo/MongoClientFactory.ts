import { MongoClient, type Db } from "mongodb";

export type MongoDbProvider = {
  db: () => Promise<Db>;
  close: () => Promise<void>;
};

/**
 * Connects on first use and shares one client between the stores built on it.
 */
export const createMongoDbProvider = (mongoUri: string, dbName = "formpull"): MongoDbProvider => {
  let connecting: Promise<MongoClient> | undefined;

  return {
    db: async () => {
      connecting ??= new MongoClient(mongoUri).connect();
      const client = await connecting;
      return client.db(dbName);
    },
    close: async () => {
      const pending = connecting;
      connecting = undefined;
      if (pending) await (await pending).close();
    }
  };
};
