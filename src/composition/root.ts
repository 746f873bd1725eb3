import { pullForms, type PullFormsDeps, type PullRunSummary } from "../application/pull/pullForms.usecase";
import { AggregateServer } from "../infrastructure/aggregate/AggregateServer";
import { FetchHttp } from "../infrastructure/http/FetchHttp";
import { createMongoDbProvider } from "../infrastructure/mongo/MongoClientFactory";
import { MongoPreferenceStore } from "../infrastructure/mongo/MongoPreferenceStore";
import { MongoSubmissionStore } from "../infrastructure/mongo/MongoSubmissionStore";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type RunPullOptions = Pick<PullFormsDeps, "onEvent" | "onStart">;

export const runPull = async (opts: RunPullOptions = {}): Promise<PullRunSummary> => {
  const env = loadEnv();
  const { pullerConfig, timeoutMs } = loadRuntimeConfigFromEnv();

  const http = new FetchHttp({ maxConnections: pullerConfig.maxHttpConnections, timeoutMs });
  const server = env.AGGREGATE_USERNAME !== undefined && env.AGGREGATE_PASSWORD !== undefined
    ? AggregateServer.authenticated(env.AGGREGATE_URL, {
      username: env.AGGREGATE_USERNAME,
      password: env.AGGREGATE_PASSWORD
    })
    : AggregateServer.normal(env.AGGREGATE_URL);

  const mongo = createMongoDbProvider(env.MONGO_URI);
  const submissions = new MongoSubmissionStore(mongo);
  const prefs = new MongoPreferenceStore(mongo);

  try {
    return await pullForms({
      http,
      server,
      prefs,
      openStore: async (form) => submissions.forForm(form),
      storageDir: env.STORAGE_DIR,
      config: pullerConfig,
      onEvent: opts.onEvent,
      onStart: opts.onStart
    });
  } finally {
    await mongo.close();
  }
};
