import { asMediaFileList, type MediaFile } from "../media/MediaFile";
import {
  MalformedXmlError,
  attributeOf,
  childElementNames,
  findElement,
  findElements,
  findRawElement,
  standaloneMarkup,
  type XmlValue
} from "../xml/xml";

export type DownloadedSubmission = {
  readonly instanceId: string;
  // the instance element as the server sent it
  readonly xml: string;
  readonly attachments: readonly MediaFile[];
};

/**
 * Parses the `<submission><data>…</data><mediaFile>…</mediaFile></submission>`
 * envelope. The instance root must carry an `instanceID` attribute; its
 * markup is cut from `raw` unchanged, with the envelope's namespace
 * declarations copied onto it.
 */
export const parseDownloadedSubmission = (root: XmlValue, raw: string): DownloadedSubmission => {
  const submission = findElement(root, "submission");
  const data = findElement(submission, "data");
  const instanceName = childElementNames(data)[0];
  const instance = instanceName === undefined ? undefined : findElement(data, instanceName);
  const rawInstance = instanceName === undefined ? undefined : findRawElement(raw, "submission", "data", instanceName);
  if (instance === undefined || rawInstance === undefined) {
    throw new MalformedXmlError("Malformed submission: missing <data> instance");
  }

  const instanceId = attributeOf(instance, "instanceID");
  if (instanceId === undefined) {
    throw new MalformedXmlError("Malformed submission: missing instanceID");
  }

  return Object.freeze({
    instanceId,
    xml: standaloneMarkup(rawInstance),
    attachments: Object.freeze(asMediaFileList(findElements(submission, "mediaFile")))
  });
};
