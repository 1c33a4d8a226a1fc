import { fetchTransport, toHttpResult, type HttpRequest, type HttpResult } from "../../src/http.js";
import { StabilityClient } from "../../src/stability/client.js";
import { DUMMY_IMAGE } from "../helpers/fakes.js";

const CONFIG = {
  apiKey: "test-secret",
  videoEndpoint: "https://media.example.test/v2beta/image-to-video",
  imageBaseUrl: "https://media.example.test/v2beta/stable-image",
  imageModel: "core",
  httpTimeoutMs: 5_000,
};

function recordingTransport(response: HttpResult) {
  const requests: HttpRequest[] = [];
  const transport = async (request: HttpRequest) => {
    requests.push(request);
    return response;
  };
  return { requests, transport };
}

describe("StabilityClient", () => {
  it("submits the image and motion bucket as multipart with bearer auth", async () => {
    const { requests, transport } = recordingTransport(toHttpResult(200, {}, new Uint8Array(0)));
    const client = new StabilityClient(CONFIG, transport);

    await client.submitImageToVideo({ image: DUMMY_IMAGE, motionBucketId: 222 });

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("https://media.example.test/v2beta/image-to-video");
    expect(requests[0].headers).toEqual({ Authorization: "Bearer test-secret" });
    expect(requests[0].multipart).toEqual([
      { name: "image", bytes: DUMMY_IMAGE.bytes, filename: "dummy.png", contentType: "image/png" },
      { name: "motion_bucket_id", value: "222" },
    ]);
    expect(requests[0].timeoutMs).toBe(5_000);
  });

  it("adds seed and cfg_scale only when given", async () => {
    const { requests, transport } = recordingTransport(toHttpResult(200, {}, new Uint8Array(0)));
    await new StabilityClient(CONFIG, transport).submitImageToVideo({
      image: DUMMY_IMAGE,
      motionBucketId: 90,
      seed: 7,
      cfgScale: 2.5,
    });
    expect(requests[0].multipart?.slice(1)).toEqual([
      { name: "motion_bucket_id", value: "90" },
      { name: "seed", value: "7" },
      { name: "cfg_scale", value: "2.5" },
    ]);
  });

  it("polls the result endpoint accepting video", async () => {
    const { requests, transport } = recordingTransport(toHttpResult(202, {}, new Uint8Array(0)));
    await new StabilityClient(CONFIG, transport).fetchVideoResult("abc123");
    expect(requests[0]).toMatchObject({
      method: "GET",
      url: "https://media.example.test/v2beta/image-to-video/result/abc123",
      headers: { Accept: "video/*", Authorization: "Bearer test-secret" },
    });
  });

  it("requests a png from the configured image model", async () => {
    const { requests, transport } = recordingTransport(toHttpResult(200, {}, new Uint8Array(0)));
    await new StabilityClient(CONFIG, transport).generateImage({
      prompt: "a lighthouse at dusk",
      aspectRatio: "16:9",
      outputFormat: "png",
    });
    expect(requests[0].url).toBe("https://media.example.test/v2beta/stable-image/generate/core");
    expect(requests[0].headers).toEqual({ Accept: "image/*", Authorization: "Bearer test-secret" });
    expect(requests[0].multipart).toEqual([
      { name: "prompt", value: "a lighthouse at dusk" },
      { name: "aspect_ratio", value: "16:9" },
      { name: "output_format", value: "png" },
    ]);
  });
});

describe("toHttpResult", () => {
  it("decodes JSON bodies and lower-cases header names", () => {
    const res = toHttpResult(
      400,
      { "Content-Type": "application/json; charset=utf-8", "X-Request-Id": "req-1" },
      new TextEncoder().encode('{"name":"bad_request"}'),
    );
    expect(res.ok).toBe(false);
    expect(res.json).toEqual({ name: "bad_request" });
    expect(res.requestId).toBe("req-1");
    expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
  });

  it("leaves binary bodies undecoded", () => {
    const res = toHttpResult(200, { "content-type": "video/mp4" }, new Uint8Array([0, 1, 2]));
    expect(res.ok).toBe(true);
    expect(res.json).toBeUndefined();
    expect(res.text).toBeUndefined();
  });
});

describe("fetchTransport", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("sends multipart fields as form data", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response('{"id":"abc123"}', { status: 200, headers: { "content-type": "application/json" } }));

    const res = await fetchTransport({
      method: "POST",
      url: "https://media.example.test/upload",
      headers: { Authorization: "Bearer test-secret" },
      multipart: [
        { name: "image", bytes: new Uint8Array([1, 2]), filename: "in.png", contentType: "image/png" },
        { name: "motion_bucket_id", value: "222" },
      ],
    });

    expect(res.status).toBe(200);
    expect(res.json).toEqual({ id: "abc123" });
    const init = fetchSpy.mock.calls[0][1];
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) throw new Error("Expected FormData body");
    expect(body.get("motion_bucket_id")).toBe("222");
    const image = body.get("image");
    expect(image).toBeInstanceOf(Blob);
  });

  it("hands fetch an aborted signal when the caller's signal is already aborted", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("", { status: 202 }));
    const caller = new AbortController();
    caller.abort();

    await fetchTransport({ method: "GET", url: "https://media.example.test/result/abc", signal: caller.signal });

    expect(fetchSpy.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it("reports a network error as status 0 instead of throwing", async () => {
    jest.spyOn(globalThis, "fetch").mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));

    const res = await fetchTransport({ method: "GET", url: "https://media.example.test/result/abc" });

    expect(res).toEqual({
      ok: false,
      status: 0,
      contentType: "",
      headers: {},
      body: new Uint8Array(0),
      text: "getaddrinfo ENOTFOUND",
    });
  });
});
