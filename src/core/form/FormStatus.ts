import path from "path";

export type RemoteFormDefinition = {
  formName: string;
  formId: string;
  version?: string;
  manifestUrl?: string;
};

export type FormStatusEvent = {
  form: FormStatus;
  statusString: string;
};

const stripIllegalChars = (name: string): string =>
  // eslint-disable-next-line no-control-regex
  name.replace(/[\u0000-\u001f\\/:*?"<>|]/g, "_").trim();

/**
 * A form being pulled: its remote identity, its last human-readable status
 * and where its files live under the storage directory.
 */
export class FormStatus {
  statusString = "";

  constructor(readonly definition: RemoteFormDefinition) {}

  get formId(): string {
    return this.definition.formId;
  }

  get formName(): string {
    return this.definition.formName;
  }

  get manifestUrl(): string | undefined {
    return this.definition.manifestUrl;
  }

  private get dirName(): string {
    return stripIllegalChars(this.formName) || stripIllegalChars(this.formId);
  }

  getFormDir(storageDir: string): string {
    return path.join(storageDir, "forms", this.dirName);
  }

  getFormFile(storageDir: string): string {
    return path.join(this.getFormDir(storageDir), `${this.dirName}.xml`);
  }

  getFormMediaDir(storageDir: string): string {
    return path.join(this.getFormDir(storageDir), `${this.dirName}-media`);
  }

  getFormMediaFile(storageDir: string, filename: string): string {
    return path.join(this.getFormMediaDir(storageDir), filename);
  }

  getSubmissionDir(storageDir: string, instanceId: string): string {
    return path.join(this.getFormDir(storageDir), "instances", stripIllegalChars(instanceId.replace(/:/g, "")));
  }

  getSubmissionFile(storageDir: string, instanceId: string): string {
    return path.join(this.getSubmissionDir(storageDir, instanceId), "submission.xml");
  }

  getSubmissionMediaFile(storageDir: string, instanceId: string, filename: string): string {
    return path.join(this.getSubmissionDir(storageDir, instanceId), filename);
  }
}
