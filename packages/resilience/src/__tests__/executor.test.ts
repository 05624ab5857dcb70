import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  InvalidRequestError,
  ProviderCallError,
  ProxyUnavailableError,
  UserFacingError,
  err,
  ok,
  type Capability,
  type ChatCallRequest,
  type Credential,
  type ImageCallRequest,
  type Outcome,
  type Result,
  type StreamChunk,
  type StreamSummary,
} from "@keyrelay/shared";
import { ResilientExecutor, type ExecutorOptions } from "../executor.js";
import type {
  CallAdapter,
  CredentialSource,
  OutcomeSink,
  ReportDetails,
  StreamingCallAdapter,
} from "../index.js";

// ─── Fakes ───

interface RecordedReport {
  credentialId: string;
  outcome: Outcome;
  details?: ReportDetails;
}

/** In-process stand-in for the token proxy */
class FakeProxy implements CredentialSource, OutcomeSink {
  readonly issued: Credential[] = [];
  readonly reports: RecordedReport[] = [];
  readonly capabilities: Capability[] = [];
  /** Provision calls (1-indexed) that fail */
  failOn = new Set<number>();
  private calls = 0;

  constructor(private readonly ids: string[] = []) {}

  async provision(capability: Capability): Promise<Result<Credential, ProxyUnavailableError>> {
    this.calls++;
    this.capabilities.push(capability);
    if (this.failOn.has(this.calls)) {
      return err(new ProxyUnavailableError("Proxy returned HTTP 503", 503));
    }
    const id = this.ids[this.calls - 1] ?? `cred-${this.calls}`;
    const credential = { id, value: `test-secret-${this.calls}` };
    this.issued.push(credential);
    return ok(credential);
  }

  report(credential: Credential, outcome: Outcome, details?: ReportDetails): void {
    this.reports.push({ credentialId: credential.id, outcome, details });
  }

  get provisionCalls(): number {
    return this.calls;
  }
}

type ChatAdapter = StreamingCallAdapter<ChatCallRequest>;
type ImageAdapter = CallAdapter<ImageCallRequest, Uint8Array>;

function createChatAdapter() {
  const perform = vi.fn<ChatAdapter["perform"]>();
  const stream = vi.fn<ChatAdapter["stream"]>();
  const adapter: ChatAdapter = { capability: "chat", perform, stream };
  return { adapter, perform, stream };
}

function createImageAdapter() {
  const perform = vi.fn<ImageAdapter["perform"]>();
  const adapter: ImageAdapter = {
    capability: "image",
    validate: (request) =>
      request.width % 8 === 0 && request.height % 8 === 0
        ? ok(request)
        : err(new InvalidRequestError("width and height must be multiples of 8", "width")),
    perform,
  };
  return { adapter, perform };
}

async function* fragments(parts: string[], failure?: unknown): AsyncGenerator<string> {
  for (const part of parts) {
    yield part;
  }
  if (failure !== undefined) throw failure;
}

async function* paced(parts: string[], intervalMs: number): AsyncGenerator<string> {
  for (const part of parts) {
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
    yield part;
  }
}

function stallAfter(parts: string[], signal: AbortSignal): AsyncGenerator<string> {
  return (async function* () {
    yield* parts;
    await new Promise<void>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(new Error("request aborted")));
    });
  })();
}

async function runStream(
  generator: AsyncGenerator<StreamChunk, StreamSummary>,
): Promise<{ chunks: StreamChunk[]; summary?: StreamSummary; error?: unknown }> {
  const chunks: StreamChunk[] = [];
  try {
    while (true) {
      const next = await generator.next();
      if (next.done) return { chunks, summary: next.value };
      chunks.push(next.value);
    }
  } catch (error) {
    return { chunks, error };
  }
}

const authFailure = () => new ProviderCallError("auth_failure", "Invalid credentials", 401);

const chatRequest: ChatCallRequest = {
  capability: "chat",
  model: "test-model",
  provider: "auto",
  messages: [
    { role: "system", content: "You are terse." },
    { role: "user", content: "Hello" },
  ],
  temperature: 0.7,
  topP: 0.95,
  maxTokens: 256,
};

const imageRequest: ImageCallRequest = {
  capability: "image",
  model: "test-image-model",
  provider: "auto",
  prompt: "a lighthouse at dusk",
  width: 1024,
  height: 1024,
  steps: 20,
  guidanceScale: 7.5,
  seed: -1,
};

const defaultOptions: ExecutorOptions = {
  maxAttempts: 3,
  inferenceTimeoutMs: 1000,
  streamIdleTimeoutMs: 1000,
};

describe("ResilientExecutor.execute", () => {
  let proxy: FakeProxy;
  let executor: ResilientExecutor;

  beforeEach(() => {
    proxy = new FakeProxy();
    executor = new ResilientExecutor({ provisioner: proxy, reporter: proxy }, defaultOptions);
  });

  it("should retry credential failures with fresh credentials until success", async () => {
    const { adapter, perform } = createChatAdapter();
    perform
      .mockRejectedValueOnce(authFailure())
      .mockRejectedValueOnce(authFailure())
      .mockResolvedValueOnce("Hi there");

    const result = await executor.execute(chatRequest, adapter);

    expect(result).toEqual({ ok: true, value: "Hi there" });
    expect(proxy.issued.map((c) => c.id)).toEqual(["cred-1", "cred-2", "cred-3"]);
    expect(perform.mock.calls.map(([credential]) => credential.id)).toEqual([
      "cred-1",
      "cred-2",
      "cred-3",
    ]);
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "auth_failure",
        details: { error: "Invalid credentials", status: 401 },
      },
      {
        credentialId: "cred-2",
        outcome: "auth_failure",
        details: { error: "Invalid credentials", status: 401 },
      },
      { credentialId: "cred-3", outcome: "success", details: undefined },
    ]);
  });

  it("should provision for the adapter's capability", async () => {
    const { adapter, perform } = createImageAdapter();
    perform.mockResolvedValue(new Uint8Array([1, 2, 3]));

    await executor.execute(imageRequest, adapter);

    expect(proxy.capabilities).toEqual(["image"]);
  });

  it("should stop at the attempt ceiling", async () => {
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(authFailure());

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("ATTEMPTS_EXHAUSTED");
      expect(result.error.message).toBe("Generation failed after 3 attempts.");
    }
    expect(perform).toHaveBeenCalledTimes(3);
    expect(proxy.reports.map((r) => r.outcome)).toEqual([
      "auth_failure",
      "auth_failure",
      "auth_failure",
    ]);
  });

  it("should retry quota failures reported by an SDK status", async () => {
    const { adapter, perform } = createChatAdapter();
    perform
      .mockRejectedValueOnce(Object.assign(new Error("429 Too Many Requests"), { status: 429 }))
      .mockResolvedValueOnce("ok");

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(true);
    expect(proxy.reports.map((r) => r.outcome)).toEqual(["quota_failure", "success"]);
  });

  it("should not retry an image transport failure", async () => {
    const { adapter, perform } = createImageAdapter();
    perform.mockRejectedValue(new ProviderCallError("transport_failure", "Bad gateway", 502));

    const result = await executor.execute(imageRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("SERVICE_UNAVAILABLE");
    }
    expect(proxy.provisionCalls).toBe(1);
    expect(perform).toHaveBeenCalledTimes(1);
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "Bad gateway", status: 502 },
      },
    ]);
  });

  it("should not retry an invalid request rejected by the provider", async () => {
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(new ProviderCallError("invalid_request", "Model not found", 404));

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REQUEST");
      expect(result.error.message).toBe("Request invalid: Model not found");
    }
    expect(perform).toHaveBeenCalledTimes(1);
  });

  it("should treat an unclassified error as a transport failure", async () => {
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(new Error("boom"));

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    expect(perform).toHaveBeenCalledTimes(1);
    expect(proxy.reports).toEqual([
      { credentialId: "cred-1", outcome: "transport_failure", details: { error: "boom" } },
    ]);
  });

  it("should reject invalid dimensions without provisioning", async () => {
    const { adapter, perform } = createImageAdapter();

    const result = await executor.execute({ ...imageRequest, width: 1020, height: 1020 }, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REQUEST");
      expect(result.error.message).toBe(
        "Request invalid: width and height must be multiples of 8",
      );
    }
    expect(proxy.provisionCalls).toBe(0);
    expect(perform).not.toHaveBeenCalled();
    expect(proxy.reports).toEqual([]);
  });

  it("should fail without retry when provisioning fails", async () => {
    proxy.failOn.add(1);
    const { adapter, perform } = createChatAdapter();

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UserFacingError);
      expect(result.error.code).toBe("SERVICE_UNAVAILABLE");
      expect(result.error.message).toBe("Service temporarily unavailable, please retry.");
    }
    expect(proxy.provisionCalls).toBe(1);
    expect(perform).not.toHaveBeenCalled();
    expect(proxy.reports).toEqual([]);
  });

  it("should surface a provisioning failure during a retry", async () => {
    proxy.failOn.add(2);
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(authFailure());

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("SERVICE_UNAVAILABLE");
    }
    expect(perform).toHaveBeenCalledTimes(1);
    expect(proxy.reports.map((r) => r.outcome)).toEqual(["auth_failure"]);
  });

  it("should end the request when the proxy re-issues a used credential", async () => {
    proxy = new FakeProxy(["cred-a", "cred-a"]);
    executor = new ResilientExecutor({ provisioner: proxy, reporter: proxy }, defaultOptions);
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(authFailure());

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("ATTEMPTS_EXHAUSTED");
      expect(result.error.message).toBe("Generation failed after 1 attempt.");
    }
    expect(perform).toHaveBeenCalledTimes(1);
    expect(proxy.reports).toHaveLength(1);
  });

  it("should honour a ceiling of one", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, maxAttempts: 1 },
    );
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValue(authFailure());

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Generation failed after 1 attempt.");
    }
    expect(proxy.provisionCalls).toBe(1);
  });

  it("should time out a call that never answers", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, inferenceTimeoutMs: 20 },
    );
    const { adapter, perform } = createChatAdapter();
    perform.mockImplementation(
      (_credential, _request, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("request aborted")));
        }),
    );

    const result = await executor.execute(chatRequest, adapter);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("SERVICE_UNAVAILABLE");
    }
    expect(perform).toHaveBeenCalledTimes(1);
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "No response within 20ms" },
      },
    ]);
  });

  it("should report a cancelled call once and surface CANCELLED", async () => {
    const controller = new AbortController();
    const { adapter, perform } = createChatAdapter();
    perform.mockImplementation((_credential, _request, signal) => {
      const pending = new Promise<string>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("request aborted")));
      });
      controller.abort();
      return pending;
    });

    const result = await executor.execute(chatRequest, adapter, { signal: controller.signal });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CANCELLED");
    }
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "cancelled by caller", cancelled: true },
      },
    ]);
  });

  it("should not provision for an already cancelled request", async () => {
    const controller = new AbortController();
    controller.abort();
    const { adapter } = createChatAdapter();

    const result = await executor.execute(chatRequest, adapter, { signal: controller.signal });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CANCELLED");
    }
    expect(proxy.provisionCalls).toBe(0);
  });

  it("should run random-seed image requests independently", async () => {
    const { adapter, perform } = createImageAdapter();
    perform
      .mockResolvedValueOnce(new Uint8Array([1]))
      .mockResolvedValueOnce(new Uint8Array([2]));

    const first = await executor.execute(imageRequest, adapter);
    const second = await executor.execute(imageRequest, adapter);

    expect(first).toEqual({ ok: true, value: new Uint8Array([1]) });
    expect(second).toEqual({ ok: true, value: new Uint8Array([2]) });
    expect(perform).toHaveBeenCalledTimes(2);
    expect(proxy.issued.map((c) => c.id)).toEqual(["cred-1", "cred-2"]);
    expect(proxy.reports.map((r) => r.outcome)).toEqual(["success", "success"]);
  });

  it("should hand each attempt its own credential value", async () => {
    const { adapter, perform } = createChatAdapter();
    perform.mockRejectedValueOnce(authFailure()).mockResolvedValueOnce("ok");

    await executor.execute(chatRequest, adapter);

    expect(perform.mock.calls.map(([credential]) => credential.value)).toEqual([
      "test-secret-1",
      "test-secret-2",
    ]);
  });
});

describe("ResilientExecutor.executeStream", () => {
  let proxy: FakeProxy;
  let executor: ResilientExecutor;

  beforeEach(() => {
    proxy = new FakeProxy();
    executor = new ResilientExecutor({ provisioner: proxy, reporter: proxy }, defaultOptions);
  });

  it("should yield chunks in order and return a summary", async () => {
    const { adapter, stream } = createChatAdapter();
    stream.mockReturnValue(fragments(["Hel", "", "lo"]));

    const { chunks, summary, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(error).toBeUndefined();
    expect(chunks).toEqual([
      { index: 0, content: "Hel", cumulativeContent: "Hel", attempt: 1 },
      { index: 1, content: "lo", cumulativeContent: "Hello", attempt: 1 },
    ]);
    expect(summary).toMatchObject({ content: "Hello", chunkCount: 2, attempts: 1 });
    expect(proxy.reports).toEqual([
      { credentialId: "cred-1", outcome: "success", details: undefined },
    ]);
  });

  it("should retry a credential failure that happens before the first chunk", async () => {
    const { adapter, stream } = createChatAdapter();
    stream
      .mockReturnValueOnce(fragments([], authFailure()))
      .mockReturnValueOnce(fragments(["Hi"]));

    const { chunks, summary } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(chunks).toEqual([{ index: 0, content: "Hi", cumulativeContent: "Hi", attempt: 2 }]);
    expect(summary).toMatchObject({ content: "Hi", attempts: 2 });
    expect(proxy.reports.map((r) => [r.credentialId, r.outcome])).toEqual([
      ["cred-1", "auth_failure"],
      ["cred-2", "success"],
    ]);
  });

  it("should surface a failure after a delivered chunk without a second stream", async () => {
    const { adapter, stream } = createChatAdapter();
    stream.mockReturnValue(fragments(["Partial"], authFailure()));

    const { chunks, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(chunks).toHaveLength(1);
    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ code: "STREAM_INTERRUPTED" });
    expect(stream).toHaveBeenCalledTimes(1);
    expect(proxy.provisionCalls).toBe(1);
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "auth_failure",
        details: { error: "Invalid credentials", status: 401 },
      },
    ]);
  });

  it("should report a consumer break as a cancelled attempt", async () => {
    let released = false;
    const { adapter, stream } = createChatAdapter();
    stream.mockReturnValue(
      (async function* () {
        try {
          let i = 0;
          while (true) {
            yield `token-${i++} `;
          }
        } finally {
          released = true;
        }
      })(),
    );

    const seen: string[] = [];
    for await (const chunk of executor.executeStream(chatRequest, adapter)) {
      seen.push(chunk.content);
      if (seen.length === 2) break;
    }

    expect(seen).toEqual(["token-0 ", "token-1 "]);
    expect(released).toBe(true);
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "cancelled by caller", cancelled: true },
      },
    ]);
  });

  it("should stop on caller abort and report the cancellation once", async () => {
    const controller = new AbortController();
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation((_credential, _request, signal) => stallAfter(["first"], signal));

    const generator = executor.executeStream(chatRequest, adapter, { signal: controller.signal });
    const first = await generator.next();
    setTimeout(() => controller.abort(), 10);
    const { chunks, error } = await runStream(generator);

    expect(first.value).toMatchObject({ content: "first" });
    expect(chunks).toEqual([]);
    expect(error).toMatchObject({ code: "CANCELLED" });
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "cancelled by caller", cancelled: true },
      },
    ]);
  });

  it("should interrupt a stream that stalls after output", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, streamIdleTimeoutMs: 20 },
    );
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation((_credential, _request, signal) => stallAfter(["first"], signal));

    const { chunks, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(chunks).toHaveLength(1);
    expect(error).toMatchObject({ code: "STREAM_INTERRUPTED" });
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "Timeout after 20ms for stream on next chunk" },
      },
    ]);
  });

  it("should let a stream that keeps producing run past the inference timeout", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, inferenceTimeoutMs: 100, streamIdleTimeoutMs: 60 },
    );
    const parts = Array.from({ length: 10 }, (_, i) => `t${i} `);
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation(() => paced(parts, 25));

    const { chunks, summary, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(error).toBeUndefined();
    expect(chunks).toHaveLength(10);
    expect(summary).toMatchObject({ content: parts.join(""), chunkCount: 10, attempts: 1 });
    expect(proxy.reports).toEqual([
      { credentialId: "cred-1", outcome: "success", details: undefined },
    ]);
  });

  it("should time out a stream that never opens", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, inferenceTimeoutMs: 30 },
    );
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation((_credential, _request, signal) => stallAfter([], signal));

    const { chunks, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(chunks).toEqual([]);
    expect(error).toMatchObject({ code: "SERVICE_UNAVAILABLE" });
    expect(proxy.reports).toEqual([
      {
        credentialId: "cred-1",
        outcome: "transport_failure",
        details: { error: "No response within 30ms" },
      },
    ]);
  });

  it("should not retry a stream that stalls before output", async () => {
    executor = new ResilientExecutor(
      { provisioner: proxy, reporter: proxy },
      { ...defaultOptions, streamIdleTimeoutMs: 20 },
    );
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation((_credential, _request, signal) => stallAfter([], signal));

    const { chunks, error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(chunks).toEqual([]);
    expect(error).toMatchObject({ code: "SERVICE_UNAVAILABLE" });
    expect(stream).toHaveBeenCalledTimes(1);
  });

  it("should throw INVALID_REQUEST before provisioning", async () => {
    const { adapter, stream } = createChatAdapter();
    const validating: ChatAdapter = {
      ...adapter,
      validate: () => err(new InvalidRequestError("message is empty", "message")),
    };

    const { error } = await runStream(executor.executeStream(chatRequest, validating));

    expect(error).toMatchObject({
      code: "INVALID_REQUEST",
      message: "Request invalid: message is empty",
    });
    expect(proxy.provisionCalls).toBe(0);
    expect(stream).not.toHaveBeenCalled();
  });

  it("should throw SERVICE_UNAVAILABLE when provisioning fails", async () => {
    proxy.failOn.add(1);
    const { adapter, stream } = createChatAdapter();

    const { error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(error).toMatchObject({ code: "SERVICE_UNAVAILABLE" });
    expect(stream).not.toHaveBeenCalled();
  });

  it("should give up after the ceiling when every stream is rejected", async () => {
    const { adapter, stream } = createChatAdapter();
    stream.mockImplementation(() => fragments([], authFailure()));

    const { error } = await runStream(executor.executeStream(chatRequest, adapter));

    expect(error).toMatchObject({
      code: "ATTEMPTS_EXHAUSTED",
      message: "Generation failed after 3 attempts.",
    });
    expect(new Set(proxy.issued.map((c) => c.id)).size).toBe(3);
    expect(proxy.reports).toHaveLength(3);
  });
});
