import { PullError } from "../errors/PullError";
import { attributeOf, childElementNames, findElement, findElements, parseXml, type XmlValue } from "../xml/xml";

const findMainInstance = (formXml: string): { name: string; element: XmlValue } | undefined => {
  const model = findElement(parseXml(formXml), "html", "head", "model");
  // secondary instances carry an id attribute; the main one does not
  const instance = findElements(model, "instance").find((candidate) => attributeOf(candidate, "id") === undefined);
  const name = childElementNames(instance)[0];
  if (instance === undefined || name === undefined) return undefined;
  const element = findElement(instance, name);
  return element === undefined ? undefined : { name, element };
};

/**
 * Builds the key the server expects when downloading one submission of a
 * form, e.g. `my_form[@version=2 and @uiVersion=null]/data[@key=uuid:…]`.
 */
export class SubmissionKeyGenerator {
  private constructor(
    readonly formId: string,
    readonly version: string | undefined,
    readonly rootElementName: string
  ) {}

  static from(formXml: string | undefined): SubmissionKeyGenerator {
    if (formXml === undefined) {
      throw new PullError({
        code: "missing_form_definition",
        message: "Can't build submission keys without a form definition"
      });
    }

    const mainInstance = findMainInstance(formXml);
    if (mainInstance === undefined) {
      throw new PullError({
        code: "missing_form_definition",
        message: "Form definition has no main instance"
      });
    }

    const { name, element } = mainInstance;
    return new SubmissionKeyGenerator(attributeOf(element, "id") ?? name, attributeOf(element, "version"), name);
  }

  buildKey(instanceId: string): string {
    return `${this.formId}[@version=${this.version ?? "null"} and @uiVersion=null]/${this.rootElementName}[@key=${instanceId}]`;
  }
}
