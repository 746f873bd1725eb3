import { mkdtemp, rm } from "fs/promises";
import { MongoClient } from "mongodb";
import type { AddressInfo } from "net";
import os from "os";
import path from "path";
import { pullForms } from "../../src/application/pull/pullForms.usecase";
import { createFakeAggregateServer, type FakeForm } from "../../src/fake-aggregate-server";
import { AggregateServer } from "../../src/infrastructure/aggregate/AggregateServer";
import { FetchHttp } from "../../src/infrastructure/http/FetchHttp";
import { createMongoDbProvider } from "../../src/infrastructure/mongo/MongoClientFactory";
import { MongoPreferenceStore } from "../../src/infrastructure/mongo/MongoPreferenceStore";
import { MongoSubmissionStore, type RecordedInstanceDoc } from "../../src/infrastructure/mongo/MongoSubmissionStore";

const run = process.env.REQUIRE_MONGO_E2E === "1";

const survey = (count: number): FakeForm => ({
  formId: "survey",
  formName: "Survey",
  submissions: Array.from({ length: count }, (_, index) => ({
    instanceId: `uuid:e2e-${index + 1}`,
    submissionDate: new Date(Date.UTC(2024, 0, 1, 0, index))
  }))
});

(run ? describe : describe.skip)("pullForms (mongo e2e)", () => {
  const mongoUri = process.env.MONGO_URI ?? "mongodb://127.0.0.1:27017/formpull";
  const dbName = "formpull_e2e";

  let client: MongoClient;
  let storageDir: string;

  beforeAll(async () => {
    client = new MongoClient(mongoUri);
    await client.connect();
  });

  beforeEach(async () => {
    await client.db(dbName).collection("recorded_instances").deleteMany({});
    await client.db(dbName).collection("preferences").deleteMany({});
    storageDir = await mkdtemp(path.join(os.tmpdir(), "pull-e2e-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(storageDir, { recursive: true, force: true });
  });

  afterAll(async () => {
    await client.close();
  });

  const pullOnce = async (form: FakeForm) => {
    const fake = createFakeAggregateServer({ forms: [form] });
    await new Promise<void>((resolve) => {
      fake.server.listen(0, "127.0.0.1", () => resolve());
    });
    const address = fake.server.address() as AddressInfo;
    const provider = createMongoDbProvider(mongoUri, dbName);
    const submissions = new MongoSubmissionStore(provider);

    try {
      const summary = await pullForms({
        http: new FetchHttp(),
        server: AggregateServer.normal(`http://127.0.0.1:${address.port}`),
        prefs: new MongoPreferenceStore(provider),
        openStore: async (status) => submissions.forForm(status),
        storageDir,
        config: { entriesPerBatch: 10, resumeLastPull: true }
      });
      return { summary, requests: fake.requests };
    } finally {
      await provider.close();
      await new Promise<void>((resolve) => fake.server.close(() => resolve()));
    }
  };

  it("records every submission once and resumes from the stored cursor", async () => {
    const first = await pullOnce(survey(25));
    expect(first.summary).toEqual({ forms: 1, succeeded: 1, failed: 0 });

    const recorded = client.db(dbName).collection<RecordedInstanceDoc>("recorded_instances");
    expect(await recorded.countDocuments({ formId: "survey" })).toBe(25);

    const cursorPref = await client.db(dbName).collection<{ _id: string; value: string }>("preferences")
      .findOne({ _id: "survey-last-cursor" });
    expect(cursorPref?.value).toContain("uuid:e2e-25");

    const second = await pullOnce(survey(27));
    expect(second.requests.filter((request) => request.startsWith("/view/downloadSubmission"))).toHaveLength(2);
    expect(await recorded.countDocuments({ formId: "survey" })).toBe(27);

    const duplicates = await recorded.aggregate([
      { $group: { _id: "$instanceId", count: { $sum: 1 } } },
      { $match: { count: { $gt: 1 } } }
    ]).toArray();
    expect(duplicates).toHaveLength(0);
  });
});
