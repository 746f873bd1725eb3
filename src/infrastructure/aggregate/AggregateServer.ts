import type { Cursor } from "../../core/cursor/Cursor";
import type { RemoteFormDefinition } from "../../core/form/FormStatus";
import { parseManifest, type MediaFile } from "../../core/media/MediaFile";
import { parseDownloadedSubmission, type DownloadedSubmission } from "../../core/submission/DownloadedSubmission";
import { findElement, findElements, textOf, type XmlDocument, type XmlNode } from "../../core/xml/xml";
import type { Credentials, Request } from "../../ports/Http";
import { asText, asXml, downloadTo } from "../http/bodies";

export const parseFormList = (root: XmlNode): RemoteFormDefinition[] =>
  findElements(findElement(root, "xforms"), "xform").flatMap((xform) => {
    const formName = textOf(findElement(xform, "name"));
    const formId = textOf(findElement(xform, "formID"));
    if (formName === undefined || formId === undefined) return [];
    return [{
      formName,
      formId,
      version: textOf(findElement(xform, "version")),
      manifestUrl: textOf(findElement(xform, "manifestUrl"))
    }];
  });

/**
 * Request builders for the aggregation server's read API. Credentials ride on
 * every request; the transport decides how to present them.
 */
export class AggregateServer {
  constructor(
    readonly baseUrl: URL,
    private readonly credentials?: Credentials
  ) {}

  static normal(baseUrl: string): AggregateServer {
    return new AggregateServer(new URL(baseUrl));
  }

  static authenticated(baseUrl: string, credentials: Credentials): AggregateServer {
    return new AggregateServer(new URL(baseUrl), credentials);
  }

  private url(pathname: string, query: Record<string, string> = {}): URL {
    const url = new URL(this.baseUrl.toString());
    const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${basePath}${pathname}`;
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);
    return url;
  }

  private get<T>(url: URL, readBody: Request<T>["readBody"]): Request<T> {
    return { method: "GET", url, credentials: this.credentials, readBody };
  }

  getFormListRequest(): Request<RemoteFormDefinition[]> {
    return this.get(this.url("/formList"), asXml(parseFormList));
  }

  getDownloadFormRequest(formId: string): Request<string> {
    return this.get(this.url("/formXml", { formId }), asText());
  }

  getManifestRequest(manifestUrl: string): Request<MediaFile[]> {
    return this.get(new URL(manifestUrl), asXml(parseManifest));
  }

  getInstanceIdBatchRequest(
    formId: string,
    entriesPerBatch: number,
    cursor: Cursor,
    includeIncomplete: boolean
  ): Request<XmlDocument> {
    return this.get(
      this.url("/view/submissionList", {
        formId,
        cursor: cursor.get(),
        numEntries: String(entriesPerBatch),
        includeIncomplete: includeIncomplete ? "true" : "false"
      }),
      asXml((root, raw) => ({ root, raw }))
    );
  }

  getDownloadSubmissionRequest(submissionKey: string): Request<DownloadedSubmission> {
    return this.get(this.url("/view/downloadSubmission", { formId: submissionKey }), asXml(parseDownloadedSubmission));
  }

  getDownloadAttachmentRequest(downloadUrl: string, target: string): Request<string> {
    return this.get(new URL(downloadUrl), downloadTo(target));
  }
}
