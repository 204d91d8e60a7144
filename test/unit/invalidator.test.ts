import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTestContext, makeConfig, type TestContext } from "../helpers/fixtures.js";

describe("TimelineInvalidator", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.useFakeTimers();
    ctx = createTestContext({ config: makeConfig({ rebuild: { debounceMs: 500 } }) });
    ctx.catalog.createAuthor("Frank Herbert");
    ctx.catalog.createBook({ title: "Dune", authors: [{ authorId: 1, role: "author" }] });
  });

  afterEach(() => {
    ctx.dispose();
    vi.useRealTimers();
  });

  function bookAuthorDetail(): string | undefined {
    const [event] = ctx.timelineStore.listByEntity({ entityType: "book", entityId: 1 });
    return event?.payload.details[0]?.value;
  }

  it("ignores creations", () => {
    ctx.catalog.createGenre("Fantasy");
    expect(ctx.invalidator.pendingCount).toBe(0);
  });

  it("refreshes dependents once the bus has been quiet", () => {
    ctx.catalog.renameAuthor(1, "F. Herbert");
    expect(ctx.invalidator.pendingCount).toBe(1);

    vi.advanceTimersByTime(499);
    expect(bookAuthorDetail()).toBe("Frank Herbert");

    vi.advanceTimersByTime(1);
    expect(ctx.invalidator.pendingCount).toBe(0);
    expect(bookAuthorDetail()).toBe("F. Herbert");
  });

  it("restarts the wait on every mutation", () => {
    ctx.catalog.renameAuthor(1, "F. Herbert");
    vi.advanceTimersByTime(400);
    ctx.catalog.updateBook(1, { pageCount: 412 });
    vi.advanceTimersByTime(400);
    expect(ctx.invalidator.pendingCount).toBe(2);

    vi.advanceTimersByTime(100);
    expect(ctx.invalidator.pendingCount).toBe(0);
    expect(bookAuthorDetail()).toBe("F. Herbert");
  });

  it("refreshes the dependents captured before a delete", () => {
    ctx.catalog.deleteAuthor(1);
    expect(ctx.invalidator.pendingCount).toBe(2);

    expect(ctx.invalidator.flush()).toBe(1);
    expect(bookAuthorDetail()).toBe("Unknown");
  });

  it("drops queued work when stopped", () => {
    ctx.catalog.renameAuthor(1, "F. Herbert");
    ctx.invalidator.stop();
    vi.advanceTimersByTime(1000);

    expect(ctx.invalidator.pendingCount).toBe(0);
    expect(bookAuthorDetail()).toBe("Frank Herbert");
  });
});
