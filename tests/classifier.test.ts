import { describe, it, expect } from "vitest";
import { createClassifier, DEFAULT_CLASSIFIER_CONFIG } from "../src/scan/classifier.js";

describe("createClassifier (defaults)", () => {
  const isCritical = createClassifier();

  it("should flag a keyword at the start of the text", () => {
    expect(isCritical("TODO: security issue here")).toBe(true);
  });

  it("should flag a keyword mid-sentence inside the prefix", () => {
    expect(isCritical("TODO: fix the security group rules for the VPC, this is not urgent")).toBe(true);
  });

  it("should ignore a keyword that starts after the prefix", () => {
    expect(isCritical("TODO: " + "x".repeat(95) + " security issue")).toBe(false);
  });

  it("should treat the prefix boundary as the keyword start offset", () => {
    // "urgent" が99文字目から始まる
    expect(isCritical("a".repeat(98) + " urgent")).toBe(true);
    // 100文字目から始まる
    expect(isCritical("a".repeat(99) + " urgent")).toBe(false);
  });

  it("should match hyphen-separated whole words", () => {
    expect(isCritical("TODO: update production-like staging environment naming")).toBe(true);
  });

  it("should not match keywords inside longer words", () => {
    expect(isCritical("TODO: see reproductions of the bug")).toBe(false);
    expect(isCritical("TODO: productions list")).toBe(false);
  });

  it("should not match keywords inside non-ASCII words", () => {
    expect(isCritical("TODO: revisar prodücción del informe")).toBe(false);
    expect(isCritical("TODO: ver éurgent")).toBe(false);
    expect(isCritical("TODO: corregir prod mañana")).toBe(true);
  });

  it("should match case-insensitively", () => {
    expect(isCritical("FIXME(P0): crash on start")).toBe(true);
    expect(isCritical("TODO: BLOCKER for release")).toBe(true);
  });

  it("should return false for empty text", () => {
    expect(isCritical("")).toBe(false);
  });

  it("should expose a frozen default config", () => {
    expect(Object.isFrozen(DEFAULT_CLASSIFIER_CONFIG)).toBe(true);
    expect(DEFAULT_CLASSIFIER_CONFIG.prefixLength).toBe(100);
    expect(DEFAULT_CLASSIFIER_CONFIG.keywords).toContain("sev1");
  });
});

describe("createClassifier (injected config)", () => {
  it("should use only the injected keywords and prefix", () => {
    const isCritical = createClassifier({ keywords: ["later"], prefixLength: 10 });

    expect(isCritical("later: do it")).toBe(true);
    expect(isCritical("TODO: do it later")).toBe(false);
    expect(isCritical("TODO: urgent")).toBe(false);
  });

  it("should never flag with an empty keyword set", () => {
    const isCritical = createClassifier({ keywords: [], prefixLength: 100 });
    expect(isCritical("TODO: urgent security blocker")).toBe(false);
  });

  it("should escape regex characters in keywords", () => {
    const isCritical = createClassifier({ keywords: ["c++"], prefixLength: 100 });
    expect(isCritical("TODO: c++ port")).toBe(true);
    expect(isCritical("TODO: cc port")).toBe(false);
  });
});
