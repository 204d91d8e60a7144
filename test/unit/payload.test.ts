import { describe, it, expect } from "vitest";
import { decodePayload, encodePayload, samePayload } from "../../src/timeline/codec.js";
import { buildPayload, formatRating, validateSnapshot } from "../../src/timeline/snapshots.js";
import { StorageError, ValidationError } from "../../src/errors.js";

describe("buildPayload", () => {
  it("derives book details in Author, Genres, Pages order", () => {
    const payload = buildPayload({
      entityType: "book",
      id: 7,
      title: "Dune",
      authors: ["Frank Herbert"],
      genres: ["Science Fiction", "Adventure"],
      pageCount: 412,
    });
    expect(payload).toEqual({
      entityType: "book",
      title: "Dune",
      details: [
        { label: "Author", value: "Frank Herbert" },
        { label: "Genres", value: "Science Fiction, Adventure" },
        { label: "Pages", value: "412" },
      ],
      genres: ["Science Fiction", "Adventure"],
    });
  });

  it("falls back to Unknown author and omits absent fields", () => {
    const payload = buildPayload({
      entityType: "book",
      id: 1,
      title: "Anonymous Tales",
      authors: [],
      genres: [],
      pageCount: null,
    });
    expect(payload.details).toEqual([{ label: "Author", value: "Unknown" }]);
  });

  it("derives reading details and reading data", () => {
    const payload = buildPayload({
      entityType: "reading",
      id: 3,
      bookId: 7,
      bookTitle: "Dune",
      authors: ["Frank Herbert", "Brian Herbert"],
      status: "read",
      rating: 4.5,
      format: "ereader",
      quickReviews: ["Page-turner", "Dense"],
    });
    expect(payload).toEqual({
      entityType: "reading",
      title: "Dune",
      details: [
        { label: "Author", value: "Frank Herbert, Brian Herbert" },
        { label: "Format", value: "eReader" },
        { label: "Rating", value: "4.5/5" },
        { label: "Notes", value: "Page-turner, Dense" },
      ],
      reading: { bookId: 7, status: "read", rating: 4.5 },
    });
  });

  it("uses the name as title for authors and genres", () => {
    expect(buildPayload({ entityType: "author", id: 2, name: "Ursula K. Le Guin" })).toEqual({
      entityType: "author",
      title: "Ursula K. Le Guin",
      details: [],
    });
    expect(buildPayload({ entityType: "genre", id: 4, name: "Fantasy" })).toEqual({
      entityType: "genre",
      title: "Fantasy",
      details: [],
    });
  });

  it("formats whole and half ratings", () => {
    expect(formatRating(4)).toBe("4/5");
    expect(formatRating(3.5)).toBe("3.5/5");
  });
});

describe("validateSnapshot", () => {
  it("rejects a blank book title", () => {
    expect(() =>
      validateSnapshot({
        entityType: "book",
        id: 1,
        title: "   ",
        authors: [],
        genres: [],
        pageCount: null,
      }),
    ).toThrow(ValidationError);
  });

  it("rejects an unknown entity type", () => {
    expect(() => validateSnapshot({ entityType: "shelf", id: 1, name: "x" })).toThrow(
      ValidationError,
    );
  });

  it("rejects ratings that are not half steps", () => {
    expect(() =>
      validateSnapshot({
        entityType: "reading",
        id: 1,
        bookId: 2,
        bookTitle: "Dune",
        authors: [],
        status: "read",
        rating: 4.3,
        format: null,
        quickReviews: [],
      }),
    ).toThrow(ValidationError);
  });

  it("lists every issue in the message", () => {
    try {
      validateSnapshot({ entityType: "author", id: -1, name: "" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect((err as ValidationError).issues).toHaveLength(2);
    }
  });
});

describe("payload codec", () => {
  it("encodes reading data with a fixed key order", () => {
    const encoded = encodePayload({
      entityType: "reading",
      title: "Dune",
      details: [],
      reading: { rating: null, status: "reading", bookId: 7 },
    });
    expect(encoded).toEqual({
      title: "Dune",
      detailsJson: "[]",
      genresJson: null,
      readingDataJson: '{"bookId":7,"status":"reading","rating":null}',
    });
  });

  it("stores genres only for books", () => {
    const book = encodePayload({ entityType: "book", title: "Dune", details: [], genres: ["SF"] });
    const author = encodePayload({ entityType: "author", title: "Frank Herbert", details: [] });
    expect(book.genresJson).toBe('["SF"]');
    expect(author.genresJson).toBeNull();
    expect(author.readingDataJson).toBeNull();
  });

  it("decodes what it encodes", () => {
    const payload = {
      entityType: "book" as const,
      title: "Dune",
      details: [{ label: "Author", value: "Frank Herbert" }],
      genres: ["SF"],
    };
    expect(decodePayload("book", encodePayload(payload))).toEqual(payload);
  });

  it("fails with StorageError on malformed columns", () => {
    expect(() =>
      decodePayload("author", { title: "x", detailsJson: "{oops", genresJson: null, readingDataJson: null }),
    ).toThrow(StorageError);
    expect(() =>
      decodePayload("reading", { title: "x", detailsJson: "[]", genresJson: null, readingDataJson: null }),
    ).toThrow("reading_data_json is missing");
    expect(() =>
      decodePayload("author", { title: "x", detailsJson: '[{"label":1}]', genresJson: null, readingDataJson: null }),
    ).toThrow(StorageError);
  });

  it("compares encoded payloads column by column", () => {
    const a = encodePayload({ entityType: "genre", title: "Fantasy", details: [] });
    const b = encodePayload({ entityType: "genre", title: "Fantasy", details: [] });
    const c = encodePayload({ entityType: "genre", title: "High Fantasy", details: [] });
    expect(samePayload(a, b)).toBe(true);
    expect(samePayload(a, c)).toBe(false);
  });
});
