import { defaultPullerConfig, resolvePullerConfig, validatePullerConfig } from "../../src/application/pull/puller.config";

describe("puller config", () => {
  it("fills defaults and normalizes optional strings", () => {
    expect(resolvePullerConfig({ formId: "  ", startFromDate: " 2024-01-31 " })).toEqual({
      ...defaultPullerConfig,
      formId: undefined,
      startFromDate: "2024-01-31"
    });
  });

  it("rejects values outside the caps", () => {
    expect(() => validatePullerConfig({ ...defaultPullerConfig, maxHttpConnections: 0 }))
      .toThrow("maxHttpConnections=0 is out of allowed range [1..32]");
    expect(() => resolvePullerConfig({ entriesPerBatch: 1001 }))
      .toThrow("entriesPerBatch=1001 is out of allowed range [1..1000]");
  });

  it("rejects a start date that is not a calendar day", () => {
    expect(() => resolvePullerConfig({ startFromDate: "2024-01-31T00:00:00Z" }))
      .toThrow("startFromDate=2024-01-31T00:00:00Z must be a YYYY-MM-DD date");
  });
});
