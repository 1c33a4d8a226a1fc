import { interpretPollResponse } from "../../../src/video/statusInterpreter.js";
import { binaryResponse, jsonResponse } from "../../helpers/fakes.js";

describe("interpretPollResponse", () => {
  it("treats 200 as success carrying the body bytes", () => {
    const bytes = new Uint8Array([9, 8, 7]);
    expect(interpretPollResponse(binaryResponse(200, bytes))).toEqual({ kind: "succeeded", payload: bytes });
  });

  it("treats 202 as still processing", () => {
    expect(interpretPollResponse(jsonResponse(202, { id: "abc", status: "in-progress" }))).toEqual({
      kind: "processing",
    });
  });

  it.each([400, 404, 500])("treats %i as a terminal failure with the body fields", (status) => {
    const outcome = interpretPollResponse(
      jsonResponse(status, { id: "e1", name: "internal_error", errors: ["timeout", "retry later"] }),
    );
    expect(outcome).toEqual({
      kind: "failed",
      error: {
        kind: "JobFailed",
        httpStatus: status,
        id: "e1",
        name: "internal_error",
        messages: ["timeout", "retry later"],
      },
    });
  });

  it("fills missing error fields with null and an empty list", () => {
    const outcome = interpretPollResponse(binaryResponse(404, new Uint8Array(0), "text/plain"));
    expect(outcome).toEqual({
      kind: "failed",
      error: { kind: "JobFailed", httpStatus: 404, id: null, name: null, messages: [] },
    });
  });

  it("leaves other statuses unclassified with a short detail", () => {
    expect(interpretPollResponse(jsonResponse(503, { message: "busy" }))).toEqual({
      kind: "unclassified",
      httpStatus: 503,
      detail: '{"message":"busy"}',
    });
  });

  it("reports a transport failure as unclassified status 0", () => {
    expect(
      interpretPollResponse({
        ok: false,
        status: 0,
        contentType: "",
        headers: {},
        body: new Uint8Array(0),
        text: "fetch failed",
      }),
    ).toEqual({ kind: "unclassified", httpStatus: 0, detail: "fetch failed" });
  });
});
