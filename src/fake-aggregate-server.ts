import http from "http";
import { URL } from "url";
import { Cursor } from "./core/cursor/Cursor";
import { md5Of } from "./core/media/MediaFile";

/**
 * In-process fake of the aggregation server's read API, for E2E and manual runs.
 * - GET /formList
 * - GET /formXml?formId=...
 * - GET /xformsManifest?formId=...
 * - GET /view/submissionList?formId=...&cursor=...&numEntries=...
 * - GET /view/downloadSubmission?formId=<submission key>
 * - GET /media/<formId>/<filename> and /attachments/<formId>/<instanceId>/<filename>
 */
export type FakeFile = { filename: string; content: string };

export type FakeSubmission = {
  instanceId: string;
  submissionDate: Date;
  attachments?: FakeFile[];
};

export type FakeForm = {
  formId: string;
  formName: string;
  version?: string;
  media?: FakeFile[];
  submissions: FakeSubmission[];
};

export type FakeAggregateOptions = {
  forms: FakeForm[];
  credentials?: { username: string; password: string };
  // answers the first `times` requests to `path` with `status`
  failures?: Array<{ path: string; times: number; status: number }>;
};

export type FakeAggregateServer = {
  server: http.Server;
  requests: string[];
};

const escapeXml = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

const formListXml = (base: string, forms: FakeForm[]) =>
  `<xforms xmlns="http://openrosa.org/xforms/xformsList">${forms.map((form) =>
    "<xform>" +
    `<formID>${escapeXml(form.formId)}</formID>` +
    `<name>${escapeXml(form.formName)}</name>` +
    (form.version ? `<version>${escapeXml(form.version)}</version>` : "") +
    (form.media?.length
      ? `<manifestUrl>${escapeXml(`${base}/xformsManifest?formId=${encodeURIComponent(form.formId)}`)}</manifestUrl>`
      : "") +
    "</xform>"
  ).join("")}</xforms>`;

const formXml = (form: FakeForm) =>
  '<h:html xmlns="http://www.w3.org/2002/xforms" xmlns:h="http://www.w3.org/1999/xhtml">' +
  `<h:head><h:title>${escapeXml(form.formName)}</h:title><model>` +
  `<instance><data id="${escapeXml(form.formId)}"${form.version ? ` version="${escapeXml(form.version)}"` : ""}>` +
  "<name/><meta><instanceID/></meta></data></instance>" +
  '<instance id="choices"><list><item>a</item></list></instance>' +
  "</model></h:head><h:body/></h:html>";

const mediaFileXml = (file: FakeFile, downloadUrl: string) =>
  "<mediaFile>" +
  `<filename>${escapeXml(file.filename)}</filename>` +
  `<hash>md5:${md5Of(file.content)}</hash>` +
  `<downloadUrl>${escapeXml(downloadUrl)}</downloadUrl>` +
  "</mediaFile>";

const manifestXml = (base: string, form: FakeForm) =>
  `<manifest xmlns="http://openrosa.org/xforms/xformsManifest">${(form.media ?? []).map((file) =>
    mediaFileXml(file, `${base}/media/${encodeURIComponent(form.formId)}/${encodeURIComponent(file.filename)}`)
  ).join("")}</manifest>`;

const attachmentUrl = (base: string, form: FakeForm, submission: FakeSubmission, file: FakeFile) =>
  `${base}/attachments/${encodeURIComponent(form.formId)}/${encodeURIComponent(submission.instanceId)}/${encodeURIComponent(file.filename)}`;

const submissionXml = (base: string, form: FakeForm, submission: FakeSubmission) =>
  '<submission xmlns="http://opendatakit.org/submissions" xmlns:orx="http://openrosa.org/xforms">' +
  `<data><data id="${escapeXml(form.formId)}" instanceID="${escapeXml(submission.instanceId)}"` +
  ` submissionDate="${submission.submissionDate.toISOString()}">` +
  `<name>${escapeXml(`Submission ${submission.instanceId}`)}</name>` +
  `<orx:meta><orx:instanceID>${escapeXml(submission.instanceId)}</orx:instanceID></orx:meta>` +
  "</data></data>" +
  (submission.attachments ?? []).map((file) =>
    mediaFileXml(file, attachmentUrl(base, form, submission, file))
  ).join("") +
  "</submission>";

const sortedSubmissions = (form: FakeForm) =>
  [...form.submissions].sort((a, b) =>
    a.submissionDate.getTime() - b.submissionDate.getTime() || a.instanceId.localeCompare(b.instanceId)
  );

const pageStart = (submissions: FakeSubmission[], cursor: Cursor): number => {
  if (cursor.isEmpty()) return 0;
  const afterLast = submissions.findIndex((submission) => submission.instanceId === cursor.lastReturnedValue);
  if (afterLast >= 0) return afterLast + 1;
  const since = cursor.lastUpdate?.getTime();
  if (since === undefined) return 0;
  const index = submissions.findIndex((submission) => submission.submissionDate.getTime() >= since);
  return index < 0 ? submissions.length : index;
};

const idChunkXml = (form: FakeForm, cursorParam: string, numEntries: number) => {
  const incoming = cursorParam.trim() === "" ? Cursor.empty() : Cursor.from(cursorParam);
  const submissions = sortedSubmissions(form);
  const start = pageStart(submissions, incoming);
  const page = submissions.slice(start, start + numEntries);
  const last = page[page.length - 1];
  const resumption = last === undefined ? incoming : Cursor.of(last.submissionDate, last.instanceId);

  return '<idChunk xmlns="http://opendatakit.org/submissions">' +
    `<idList>${page.map((submission) => `<id>${escapeXml(submission.instanceId)}</id>`).join("")}</idList>` +
    `<resumptionCursor>${escapeXml(resumption.get())}</resumptionCursor>` +
    "</idChunk>";
};

const SUBMISSION_KEY = /^([^[]+)\[.*\]\/[^[]+\[@key=([^\]]+)\]$/;

export const createFakeAggregateServer = (opts: FakeAggregateOptions): FakeAggregateServer => {
  const requests: string[] = [];
  const failuresLeft = new Map((opts.failures ?? []).map((failure) => [failure.path, { ...failure }]));
  const findForm = (formId: string | null) => opts.forms.find((form) => form.formId === formId);

  const server = http.createServer((req, res) => {
    const base = `http://${req.headers.host ?? "localhost"}`;
    const url = new URL(req.url ?? "/", base);
    requests.push(`${url.pathname}${url.search}`);

    const sendXml = (body: string) => {
      res.writeHead(200, { "content-type": "text/xml; charset=utf-8" });
      res.end(body);
    };
    const notFound = () => {
      res.writeHead(404);
      res.end();
    };

    if (opts.credentials) {
      const expected = `Basic ${Buffer.from(`${opts.credentials.username}:${opts.credentials.password}`).toString("base64")}`;
      if (req.headers.authorization !== expected) {
        res.writeHead(401, { "www-authenticate": 'Basic realm="aggregate"' });
        return res.end();
      }
    }

    const failure = failuresLeft.get(url.pathname);
    if (failure && failure.times > 0) {
      failure.times -= 1;
      res.writeHead(failure.status);
      return res.end();
    }

    if (url.pathname === "/formList") return sendXml(formListXml(base, opts.forms));

    if (url.pathname === "/formXml") {
      const form = findForm(url.searchParams.get("formId"));
      return form ? sendXml(formXml(form)) : notFound();
    }

    if (url.pathname === "/xformsManifest") {
      const form = findForm(url.searchParams.get("formId"));
      return form ? sendXml(manifestXml(base, form)) : notFound();
    }

    if (url.pathname === "/view/submissionList") {
      const form = findForm(url.searchParams.get("formId"));
      if (!form) return notFound();
      const numEntries = Number(url.searchParams.get("numEntries") ?? "100");
      return sendXml(idChunkXml(form, url.searchParams.get("cursor") ?? "", numEntries));
    }

    if (url.pathname === "/view/downloadSubmission") {
      const match = SUBMISSION_KEY.exec(url.searchParams.get("formId") ?? "");
      const form = match ? findForm(match[1]) : undefined;
      const submission = form?.submissions.find((candidate) => candidate.instanceId === match?.[2]);
      return form && submission ? sendXml(submissionXml(base, form, submission)) : notFound();
    }

    const [kind, ...segments] = url.pathname.split("/").filter((segment) => segment !== "").map(decodeURIComponent);
    if (kind === "media" && segments.length === 2) {
      const file = findForm(segments[0])?.media?.find((candidate) => candidate.filename === segments[1]);
      if (!file) return notFound();
      res.writeHead(200, { "content-type": "application/octet-stream" });
      return res.end(file.content);
    }
    if (kind === "attachments" && segments.length === 3) {
      const file = findForm(segments[0])?.submissions
        .find((submission) => submission.instanceId === segments[1])?.attachments
        ?.find((candidate) => candidate.filename === segments[2]);
      if (!file) return notFound();
      res.writeHead(200, { "content-type": "application/octet-stream" });
      return res.end(file.content);
    }

    return notFound();
  });

  return { server, requests };
};

const demoForm = (submissionCount: number): FakeForm => ({
  formId: "household_survey",
  formName: "Household survey",
  version: "2",
  media: [{ filename: "logo.png", content: "logo-bytes" }],
  submissions: Array.from({ length: submissionCount }, (_, index) => ({
    instanceId: `uuid:demo-${index + 1}`,
    submissionDate: new Date(Date.UTC(2024, 0, 1, 0, index)),
    attachments: index % 2 === 0 ? [{ filename: "photo.jpg", content: `photo-${index + 1}` }] : []
  }))
});

if (require.main === module) {
  const port = Number(process.env.FAKE_AGGREGATE_PORT ?? 3999);
  const { server } = createFakeAggregateServer({ forms: [demoForm(Number(process.env.FAKE_AGGREGATE_SUBMISSIONS ?? 25))] });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake aggregate server on http://localhost:${port}`);
  });
}
