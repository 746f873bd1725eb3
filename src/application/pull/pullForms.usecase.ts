import { PullError, toErrorMessage } from "../../core/errors/PullError";
import { FormStatus } from "../../core/form/FormStatus";
import type { AggregateServer } from "../../infrastructure/aggregate/AggregateServer";
import { describeFailure, type Http } from "../../ports/Http";
import type { PreferenceStore } from "../../ports/PreferenceStore";
import type { OpenSubmissionStore } from "../../ports/SubmissionStore";
import { JobsRunner } from "../../shared/job/JobsRunner";
import { resolveStartCursor, storeLastCursor } from "./lastCursor";
import { PullFromAggregate } from "./PullFromAggregate";
import type { PullResult } from "./PullResult";
import type { OnFormStatusEvent } from "./PullTracker";
import { resolvePullerConfig, type PullerConfigInput } from "./puller.config";

export type PullRunSummary = {
  forms: number;
  succeeded: number;
  failed: number;
};

export type PullFormsDeps = {
  http: Http;
  server: AggregateServer;
  prefs: PreferenceStore;
  openStore: OpenSubmissionStore;
  storageDir: string;
  config: PullerConfigInput;
  onEvent?: OnFormStatusEvent;
  // receives the runner as soon as it starts, e.g. to wire a signal handler to cancel()
  onStart?: (runner: JobsRunner<PullResult>) => void;
};

/**
 * Pulls every form the server lists (or just `config.formId`), one job per
 * form, and stores each form's resulting cursor for the next run.
 */
export const pullForms = async (deps: PullFormsDeps): Promise<PullRunSummary> => {
  const { http, server, prefs } = deps;
  const config = resolvePullerConfig(deps.config);

  const response = await http.execute(server.getFormListRequest());
  if (!response.ok) {
    throw new PullError({
      code: "form_list_failed",
      message: `Error getting the form list: ${describeFailure(response)}`,
      context: { status: response.status }
    });
  }

  const forms = response.body
    .filter((definition) => config.formId === undefined || definition.formId === config.formId)
    .map((definition) => new FormStatus(definition));
  if (config.formId !== undefined && forms.length === 0) {
    throw new PullError({
      code: "form_not_found",
      message: `Form ${config.formId} not found`,
      context: { formId: config.formId }
    });
  }

  const pullOp = new PullFromAggregate({
    http,
    server,
    storageDir: deps.storageDir,
    includeIncomplete: config.includeIncomplete,
    entriesPerBatch: config.entriesPerBatch,
    openStore: deps.openStore,
    onEvent: deps.onEvent ?? (() => undefined)
  });

  const jobs = [];
  for (const form of forms) {
    const startCursor = await resolveStartCursor({
      prefs,
      formId: form.formId,
      resumeLastPull: config.resumeLastPull,
      startFromDate: config.startFromDate
    });
    jobs.push(pullOp.pull(form, startCursor));
  }

  const runner = JobsRunner.launchAsync(jobs, {
    concurrency: config.maxHttpConnections,
    onSuccess: async (results) => {
      for (const result of results) {
        if (result.hasLastCursor()) await storeLastCursor(prefs, result.form, result.getLastCursor());
      }
    },
    onError: (error) => {
      const context = error instanceof PullError ? error.context : {};
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({
        event: "pull.form_failed",
        name: error instanceof Error ? error.name : "Error",
        message: toErrorMessage(error),
        ...context
      }));
    }
  });
  deps.onStart?.(runner);

  const report = await runner.waitForCompletion();
  const summary: PullRunSummary = {
    forms: forms.length,
    succeeded: report.results.length,
    failed: forms.length - report.results.length
  };
  console.log(JSON.stringify({ event: "pull.completed", ...summary }));
  return summary;
};
