import { describe, it, expect } from "vitest";
import { LineBuffer } from "../core/line_buffer";
import { IntrinsicsStage, replaceIntrinsics } from "../language/intrinsics";

describe("replaceIntrinsics", () => {
  it("maps double-precision intrinsics onto the standard library", () => {
    expect(replaceIntrinsics("z = dcmplx(dble(a), dimag(w)) + dconjg(w)")).toBe(
      "z = std::complex<double>(std::real(a), std::imag(w)) + std::conj(w)"
    );
  });

  it("rewrites mod with plain operands", () => {
    expect(replaceIntrinsics("k = mod(i, 2)")).toBe("k = (i % 2)");
    expect(replaceIntrinsics("k = mod(i+1, 2)")).toBe("k = mod(i+1, 2)");
  });

  it("does not qualify abs twice", () => {
    expect(replaceIntrinsics("x = abs(y)")).toBe("x = std::abs(y)");
    expect(replaceIntrinsics("x = std::abs(y)")).toBe("x = std::abs(y)");
  });

  it("leaves quoted text alone", () => {
    expect(replaceIntrinsics(`report("abs", abs(x))`)).toBe(`report("abs", std::abs(x))`);
  });
});

describe("IntrinsicsStage", () => {
  it("skips comment lines", () => {
    const buffer = new LineBuffer([
      { text: "      x = dble(k)", shape: "assignment", origin: 1 },
      { text: "      // x = dble(k)", shape: "comment", origin: 2 },
    ]);
    new IntrinsicsStage().run(buffer);
    expect(buffer.texts()).toEqual(["      x = std::real(k)", "      // x = dble(k)"]);
  });
});
