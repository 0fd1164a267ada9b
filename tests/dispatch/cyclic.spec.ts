import { beforeEach, describe, expect, it, vi } from "vitest";
import { NO_RECIPIENTS_MESSAGE, runCyclicBroadcast } from "../../src/features/dispatch/cyclic.service.js";
import { BUSY_MESSAGE } from "../../src/features/dispatch/dispatch.service.js";
import { createSessionManager, type SessionManager } from "../../src/features/dispatch/session.state.js";
import { runSingleTarget } from "../../src/features/dispatch/singleTarget.service.js";
import { chatIdRecipient, type Recipient } from "../../src/features/recipients/recipient.js";
import { alwaysDelivered, collectingReporter, FakeClock, scriptedTransport } from "../helpers/fakes.js";

const A = chatIdRecipient("1");
const B = chatIdRecipient("2");
const C = chatIdRecipient("3");

describe("runCyclicBroadcast", () => {
  let clock: FakeClock;
  let gate: SessionManager;

  beforeEach(() => {
    clock = new FakeClock();
    gate = createSessionManager();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("sweeps all recipients repeatedly until the deadline", async () => {
    const { transport, calls } = scriptedTransport(alwaysDelivered, clock);
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 0.1, durationMinutes: 0.2, recipients: [A, B, C] }
    );

    // each sweep takes 200 ms and is padded to the 1 s floor
    expect(calls).toHaveLength(36);
    expect(calls.slice(0, 6).map((c) => [c.to, c.at])).toEqual([
      ["1", 0],
      ["2", 100],
      ["3", 200],
      ["1", 1000],
      ["2", 1100],
      ["3", 1200],
    ]);
    expect(calls.every((c) => c.at < 12_000)).toBe(true);
    expect(result.summary).toMatchObject({
      mode: "cyclic",
      attempts: 36,
      delivered: 36,
      failed: 0,
      rateLimitWaits: 0,
      stopReason: "deadline-expired",
      elapsedMs: 12_000,
    });
    expect(result.message).toBe(
      "Массовая рассылка ЗАВЕРШЕНА ПО ВРЕМЕНИ за 12.00 сек. (0.2 мин). " +
        "Всего попыток: 36. Успешно: 36. Ошибок: 0. Ожиданий Rate Limit: 0."
    );
    expect(gate.active()).toBeNull();
  });

  it("never starts an attempt after the deadline when sends are slow", async () => {
    const { transport, calls } = scriptedTransport(alwaysDelivered, clock, 700);
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 0.1, durationMinutes: 0.05, recipients: [A, B, C] }
    );

    expect(calls.length).toBeGreaterThan(0);
    expect(calls.every((c) => c.at < 3000)).toBe(true);
    expect(result.summary?.stopReason).toBe("deadline-expired");
  });

  it("interrupts the inter-recipient delay when the deadline passes", async () => {
    const { transport, calls } = scriptedTransport(alwaysDelivered, clock);
    const { reporter, lines } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 5, durationMinutes: 0.05, recipients: [A, B] }
    );

    expect(calls).toHaveLength(1);
    expect(clock.t).toBe(3000);
    expect(result.summary).toMatchObject({ attempts: 1, delivered: 1, stopReason: "deadline-expired" });
    expect(lines.map((l) => l.line)).toContain("Время рассылки истекло во время задержки между чатами.");
  });

  it("retries once after a rate limit and takes the failure back on success", async () => {
    const { transport, calls } = scriptedTransport(
      (n) => (n === 0 ? { kind: "rate-limited", retryAfterMs: 2000 } : { kind: "delivered" }),
      clock
    );
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 1, durationMinutes: 1, recipients: [A, B] }
    );

    const s = result.summary;
    expect(s).not.toBeNull();
    expect(s?.rateLimitWaits).toBe(1);
    expect(s?.failed).toBe(0);
    expect(s?.delivered).toBe(s?.attempts);
    expect(s?.transportCalls).toBe((s?.attempts ?? 0) + 1);
    expect(s?.lastError).toBeNull();
    // retry to A at 2000, then B right away without the 1 s delay
    expect(calls.slice(0, 3).map((c) => [c.to, c.at])).toEqual([
      ["1", 0],
      ["1", 2000],
      ["2", 2000],
    ]);
  });

  it("clears an earlier error once a rate-limited retry succeeds", async () => {
    const { transport, calls } = scriptedTransport(
      (n) =>
        n === 0
          ? { kind: "rejected", reason: "400: x" }
          : n === 1
            ? { kind: "rate-limited", retryAfterMs: 1000 }
            : { kind: "delivered" },
      clock
    );
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 1, durationMinutes: 0.05, recipients: [A] }
    );

    // sweeps at 0 (rejected), 1000 (rate limit, retry at 2000), 2000
    expect(calls.map((c) => c.at)).toEqual([0, 1000, 2000, 2000]);
    expect(result.summary).toMatchObject({
      attempts: 3,
      delivered: 2,
      failed: 1,
      rateLimitWaits: 1,
      lastError: null,
      stopReason: "deadline-expired",
    });
    expect(result.message).not.toContain("Последняя ошибка");
  });

  it("keeps the failure when the retry fails", async () => {
    const { transport } = scriptedTransport(
      (n) =>
        n === 0
          ? { kind: "rate-limited", retryAfterMs: 1000 }
          : n === 1
            ? { kind: "rejected", reason: "403: Forbidden: bot was blocked by the user" }
            : { kind: "delivered" },
      clock
    );
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 1, durationMinutes: 0.05, recipients: [A] }
    );

    // sweeps at 0 (rate limit, retry at 1000), 1000, 2000
    expect(result.summary).toMatchObject({
      attempts: 3,
      delivered: 2,
      failed: 1,
      rateLimitWaits: 1,
      lastError: "1: Telegram отклонил запрос: 403: Forbidden: bot was blocked by the user (после ожидания)",
    });
  });

  it("stops waiting out a rate limit once the deadline passes", async () => {
    const { transport, calls } = scriptedTransport(() => ({ kind: "rate-limited", retryAfterMs: 10_000 }), clock);
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 1, durationMinutes: 0.05, recipients: [A] }
    );

    expect(calls).toHaveLength(1);
    expect(clock.t).toBe(3000);
    expect(result.ok).toBe(false);
    expect(result.summary).toMatchObject({
      attempts: 1,
      delivered: 0,
      failed: 1,
      rateLimitWaits: 1,
      stopReason: "deadline-expired",
      lastError: "1: Rate Limit: Telegram просит подождать 10.0 сек.",
    });
  });

  it("aborts every remaining sweep on an invalid credential", async () => {
    const { transport, calls } = scriptedTransport(
      (n) => (n === 1 ? { kind: "invalid-credential" } : { kind: "delivered" }),
      clock
    );
    const { reporter } = collectingReporter();

    const result = await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 0.1, durationMinutes: 1, recipients: [A, B, C] }
    );

    expect(calls).toHaveLength(2);
    expect(result.summary).toMatchObject({ attempts: 2, delivered: 1, failed: 1, stopReason: "fatal-credential" });
    expect(result.message.startsWith("Массовая рассылка ОСТАНОВЛЕНА (токен недействителен)")).toBe(true);
  });

  it("uses the recipient list captured at start", async () => {
    const list: Recipient[] = [A];
    const { transport, calls } = scriptedTransport(() => {
      list.push(B);
      return { kind: "delivered" };
    }, clock);
    const { reporter } = collectingReporter();

    await runCyclicBroadcast(
      { transport, reporter, clock, sessions: gate },
      { text: "news", delaySec: 0.5, durationMinutes: 0.05, recipients: list }
    );

    expect(new Set(calls.map((c) => c.to))).toEqual(new Set(["1"]));
  });

  it("holds the session slot for its whole run", async () => {
    let nested: Awaited<ReturnType<typeof runSingleTarget>> | undefined;
    const { transport } = scriptedTransport(alwaysDelivered, clock);
    const probe = {
      async deliver(...args: Parameters<typeof transport.deliver>) {
        if (!nested) {
          nested = await runSingleTarget(
            { transport, reporter: collectingReporter().reporter, clock, sessions: gate },
            { recipient: "9", text: "x", count: 1, delaySec: 0 }
          );
        }
        return transport.deliver(...args);
      },
    };

    await runCyclicBroadcast(
      { transport: probe, reporter: collectingReporter().reporter, clock, sessions: gate },
      { text: "news", delaySec: 1, durationMinutes: 0.02, recipients: [A] }
    );

    expect(nested).toEqual({ ok: false, started: false, message: BUSY_MESSAGE, summary: null });
    expect(gate.active()).toBeNull();
  });

  it.each([
    [{ recipients: [], delaySec: 1, durationMinutes: 1, text: "x" }, NO_RECIPIENTS_MESSAGE],
    [{ recipients: [A], delaySec: 0, durationMinutes: 1, text: "x" }, "Задержка должна быть больше нуля."],
    [{ recipients: [A], delaySec: 1, durationMinutes: -2, text: "x" }, "Длительность рассылки должна быть больше нуля."],
    [{ recipients: [A], delaySec: 1, durationMinutes: 1, text: " " }, "Текст для рассылки пустой."],
  ])("does not start on invalid input %#", async (input, message) => {
    const { transport, calls } = scriptedTransport(alwaysDelivered, clock);
    const result = await runCyclicBroadcast({ transport, reporter: collectingReporter().reporter, clock, sessions: gate }, input);

    expect(result).toEqual({ ok: false, started: false, message, summary: null });
    expect(calls).toHaveLength(0);
  });
});
