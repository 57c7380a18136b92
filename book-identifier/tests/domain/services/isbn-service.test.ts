import { describe, expect, it } from "vitest";

import {
  convertIsbn10To13,
  isIsbn10,
  isIsbn13,
  normalizeIsbn,
  pickPreferredIsbn
} from "@/domain/services/isbn-service";

describe("normalizeIsbn", () => {
  it("strips separators and upper-cases the check digit", () => {
    expect(normalizeIsbn("978-0-13-235088-4")).toBe("9780132350884");
    expect(normalizeIsbn(" 0-8044-2957-x ")).toBe("080442957X");
  });
});

describe("isbn format checks", () => {
  it("recognizes both lengths", () => {
    expect(isIsbn13("9780134685991")).toBe(true);
    expect(isIsbn10("0134685997")).toBe(true);
    expect(isIsbn13("0134685997")).toBe(false);
    expect(isIsbn10("12345")).toBe(false);
  });
});

describe("convertIsbn10To13", () => {
  it("prefixes 978 and recomputes the check digit", () => {
    expect(convertIsbn10To13("0132350882")).toBe("9780132350884");
    expect(convertIsbn10To13("4-10-109205-0")).toBe("9784101092058");
  });
});

describe("pickPreferredIsbn", () => {
  it("prefers ISBN-13 regardless of position", () => {
    expect(pickPreferredIsbn(["0134685997", "9780134685991"])).toBe("9780134685991");
  });

  it("falls back to ISBN-10 and then null", () => {
    expect(pickPreferredIsbn([null, "0-13-468599-7"])).toBe("0134685997");
    expect(pickPreferredIsbn([undefined, " ", "abc"])).toBeNull();
  });
});
