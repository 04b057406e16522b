import { describe, expect, it } from "vitest";
import { compute, isDegenerate, validateSectionInput, type SectionInput } from "./section.js";
import { defaultsFor } from "./defaults.js";
import { InvalidGeometryError } from "./errors.js";

const imperial = defaultsFor("imperial");
const si = defaultsFor("si");

function withFields(base: SectionInput, fields: Partial<SectionInput>): SectionInput {
  return { ...base, ...fields };
}

describe("compute: Imperial defaults (4 No. 8 bars)", () => {
  const r = compute(imperial);

  it("computes steel area, tension and stress block", () => {
    expect(r.As).toBeCloseTo(3.16, 10);
    expect(r.T).toBeCloseTo(189600, 6);
    expect(r.a).toBeCloseTo(4.647058823529412, 10);
    expect(r.c).toBeCloseTo(5.467128027681661, 10);
  });

  it("yields the steel", () => {
    expect(r.epsilon_y).toBeCloseTo(0.0020689655172413794, 12);
    expect(r.epsilon_s).toBeCloseTo(0.006602848101265823, 12);
    expect(r.steel_yields).toBe(true);
    expect(r.strain_state).toBe("yielded");
    expect(r.fs).toBe(60000);
  });

  it("computes Mn in lb-in and k-ft", () => {
    expect(imperial.d - r.a / 2).toBeCloseTo(15.18, 2);
    expect(r.Mn).toBeCloseTo(2877458.8235294116, 4);
    expect(r.display.Mn).toBeCloseTo(239.788235, 5);
    expect(r.display.Mn_k).toBeCloseTo(2877.458824, 5);
    expect(r.display.T).toBeCloseTo(189.6, 8);
  });

  it("is tension controlled", () => {
    expect(r.epsilon_t).toBe(r.epsilon_s);
    expect(r.phi).toBe(0.9);
    expect(r.phi_Mn).toBeCloseTo(0.9 * 2877458.8235294116, 4);
  });

  it("checks minimum steel with the fy term governing", () => {
    expect(r.As_min).toBeCloseTo(0.7, 10);
    expect(r.As_min_terms.sqrt_fc).toBeCloseTo(0.6640783086353595, 10);
    expect(r.As_min_terms.fy_term).toBeCloseTo(0.7, 10);
    expect(r.As_min_terms.governs).toBe("fy");
    expect(r.as_min_ok).toBe(true);
  });

  it("classifies the section as under-reinforced", () => {
    expect(r.rho).toBeCloseTo(0.015047619047619, 12);
    expect(r.rho_b).toBeCloseTo(0.028506802721088426, 12);
    expect(r.classification).toBe("under-reinforced");
  });

  it("reports no warnings", () => {
    expect(r.warnings).toEqual([]);
  });
});

describe("compute: As = 3.1416 in² (4 bars of 0.7854 in²)", () => {
  const input = withFields(imperial, { n_bars: 4, bar_area: 0.7854 });
  const r = compute(input);

  it("computes the stress block and lever arm", () => {
    expect(r.As).toBeCloseTo(3.1416, 10);
    expect(r.a).toBeCloseTo(4.62, 10);
    expect(input.d - r.a / 2).toBeCloseTo(15.19, 10);
    expect(r.steel_yields).toBe(true);
  });

  it("computes Mn", () => {
    expect(r.Mn).toBeCloseTo(3.1416 * 60000 * 15.19, 4);
    expect(r.display.Mn).toBeCloseTo(238.60452, 5);
  });
});

describe("compute: SI defaults (3 bars of 510 mm²)", () => {
  const r = compute(si);

  it("computes the stress block and yielding steel", () => {
    expect(r.As).toBe(1530);
    expect(r.a).toBeCloseTo(151.2, 10);
    expect(r.c).toBeCloseTo(177.88235294117646, 10);
    expect(r.epsilon_y).toBeCloseTo(0.0021, 12);
    expect(r.epsilon_s).toBeCloseTo(0.005432539682539683, 12);
    expect(r.steel_yields).toBe(true);
  });

  it("computes Mn in N-mm and kN-m", () => {
    expect(r.Mn).toBeCloseTo(272719440, 2);
    expect(r.display.Mn).toBeCloseTo(272.71944, 6);
    expect(r.display.Mn_k).toBeCloseTo(272719440, 2);
    expect(r.display.T).toBeCloseTo(642.6, 8);
  });

  it("uses the SI minimum steel constants", () => {
    expect(r.As_min).toBeCloseTo(416.6666667, 6);
    expect(r.As_min_terms.sqrt_fc).toBeCloseTo(332.748, 2);
    expect(r.As_min_terms.governs).toBe("fy");
    expect(r.as_min_ok).toBe(true);
  });

  it("matches rho_b for the SI materials", () => {
    expect(r.rho_b).toBeCloseTo(0.02023809523809524, 12);
  });
});

describe("compute: steel that does not yield", () => {
  const input = withFields(imperial, { b: 8, n_bars: 4, bar_area: 1.27 });
  const r = compute(input);

  it("keeps the stress block from fy and uses the elastic steel stress", () => {
    expect(r.As).toBeCloseTo(5.08, 10);
    expect(r.a).toBeCloseTo(11.205882352941176, 10);
    expect(r.c).toBeCloseTo(13.183391003460207, 10);
    expect(r.epsilon_s).toBeCloseTo(0.0009822834645669294, 12);
    expect(r.steel_yields).toBe(false);
    expect(r.strain_state).toBe("elastic");
    expect(r.fs).toBeCloseTo(28486.220472440953, 6);
  });

  it("computes Mn with fs and the same a", () => {
    expect(r.Mn).toBeCloseTo(5.08 * 28486.220472440953 * (17.5 - 11.205882352941176 / 2), 4);
    expect(r.display.Mn).toBeCloseTo(143.4686, 3);
  });

  it("is compression controlled and over-reinforced", () => {
    expect(r.phi).toBe(0.65);
    expect(r.classification).toBe("over-reinforced");
    expect(r.as_min_ok).toBe(true);
  });
});

describe("compute: no reinforcement", () => {
  it("returns the degenerate state for zero bars", () => {
    const r = compute(withFields(imperial, { n_bars: 0 }));
    expect(r.As).toBe(0);
    expect(r.a).toBe(0);
    expect(r.c).toBe(0);
    expect(r.epsilon_s).toBeNull();
    expect(r.steel_yields).toBeNull();
    expect(r.strain_state).toBe("degenerate");
    expect(r.fs).toBe(0);
    expect(r.Mn).toBe(0);
    expect(r.phi).toBeNull();
    expect(r.phi_Mn).toBe(0);
    expect(r.as_min_ok).toBe(false);
    expect(isDegenerate(r)).toBe(true);
    expect(r.warnings).toEqual([
      "No tension reinforcement (As = 0); strain state is undefined and Mn = 0.",
    ]);
  });

  it("returns the degenerate state for zero bar area", () => {
    const r = compute(withFields(si, { bar_area: 0 }));
    expect(r.strain_state).toBe("degenerate");
    expect(r.Mn).toBe(0);
    expect(Number.isNaN(r.Mn)).toBe(false);
  });
});

describe("compute: minimum steel", () => {
  it("passes a single 0.79 in² bar against As,min = 0.7 in²", () => {
    const r = compute(withFields(imperial, { n_bars: 1 }));
    expect(r.As).toBe(0.79);
    expect(r.as_min_ok).toBe(true);
    expect(r.display.Mn).toBeCloseTo(66.8305, 3);
  });

  it("fails a single 200 mm² bar against As,min = 416.67 mm²", () => {
    const r = compute(withFields(si, { n_bars: 1, bar_area: 200 }));
    expect(r.As).toBe(200);
    expect(r.as_min_ok).toBe(false);
  });

  it("lets the square-root term govern for high-strength concrete", () => {
    const r = compute(withFields(imperial, { fc_prime: 6000 }));
    // 3 * sqrt(6000) = 232.4 > 200
    expect(r.As_min_terms.governs).toBe("sqrt_fc");
    expect(r.As_min).toBeCloseTo(((3 * Math.sqrt(6000)) / 60000) * 12 * 17.5, 10);
  });
});

describe("compute: minimum steel grows with the section", () => {
  const sizes = [6, 8, 12, 20, 40];

  for (const base of [imperial, si]) {
    const scale = base.unit_system === "si" ? 25 : 1;

    it(`never decreases As,min as b grows (${base.unit_system})`, () => {
      const values = sizes.map((b) => compute(withFields(base, { b: b * scale })).As_min);
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeGreaterThanOrEqual(values[i - 1] ?? Infinity);
      }
    });

    it(`never decreases As,min as d grows (${base.unit_system})`, () => {
      const values = sizes.map((d) => compute(withFields(base, { d: d * scale, h: 50 * scale })).As_min);
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeGreaterThanOrEqual(values[i - 1] ?? Infinity);
      }
    });
  }
});

describe("compute: balanced section", () => {
  it("classifies As = rho_b·b·d as balanced", () => {
    const rho_b = compute(imperial).rho_b;
    const r = compute(withFields(imperial, { n_bars: 1, bar_area: rho_b * 12 * 17.5 }));
    expect(r.classification).toBe("balanced");
  });
});

describe("compute: warnings", () => {
  it("warns when d is not less than h", () => {
    const r = compute(withFields(imperial, { d: 21 }));
    expect(r.warnings).toContain(
      "Effective depth d = 21 is not less than total depth h = 20; the tension steel lies outside the section.",
    );
  });

  it("warns when beta1 is outside 0.65 - 0.85", () => {
    const r = compute(withFields(imperial, { beta1: 0.9 }));
    expect(r.warnings).toContain("beta1 = 0.9 is outside the ACI 318 range 0.65 - 0.85.");
  });

  it("warns when the neutral axis reaches the steel", () => {
    const r = compute(withFields(imperial, { d: 4 }));
    expect(r.warnings).toEqual([
      "Neutral axis depth c = 5.4671 is at or below the steel (d = 4); the steel is not in tension.",
    ]);
  });
});

describe("compute: invalid input", () => {
  it("rejects a negative concrete strength", () => {
    expect(() => compute(withFields(imperial, { fc_prime: -100 }))).toThrow(InvalidGeometryError);
    expect(() => compute(withFields(imperial, { fc_prime: -100 }))).toThrow(
      "fc_prime must be a positive number. Got -100.",
    );
  });

  it("rejects a zero width", () => {
    expect(() => compute(withFields(imperial, { b: 0 }))).toThrow(InvalidGeometryError);
    expect(() => compute(withFields(imperial, { b: 0 }))).toThrow("b must be a positive number. Got 0.");
  });

  it("rejects negative and fractional bar counts", () => {
    expect(() => compute(withFields(imperial, { n_bars: -1 }))).toThrow(
      "n_bars must be a non-negative integer. Got -1.",
    );
    expect(() => compute(withFields(imperial, { n_bars: 2.5 }))).toThrow(
      "n_bars must be a non-negative integer. Got 2.5.",
    );
  });

  it("rejects a negative bar area", () => {
    expect(() => compute(withFields(si, { bar_area: -10 }))).toThrow(
      "bar_area must be a non-negative number. Got -10.",
    );
  });

  it("rejects non-finite values", () => {
    const issues = validateSectionInput(withFields(imperial, { fc_prime: Number.NaN, d: Infinity }));
    expect(issues.map((i) => i.field)).toEqual(["fc_prime", "d"]);
  });

  it("lists every issue in the error", () => {
    try {
      compute(withFields(imperial, { b: -12, h: 0 }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidGeometryError);
      if (!(err instanceof InvalidGeometryError)) return;
      expect(err.issues.map((i) => i.field)).toEqual(["b", "h"]);
      expect(err.message).toBe(
        "Invalid section input:\n  - b must be a positive number. Got -12.\n  - h must be a positive number. Got 0.",
      );
    }
  });
});

describe("compute: purity", () => {
  it("returns a frozen result", () => {
    const r = compute(imperial);
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.warnings)).toBe(true);
    expect(Object.isFrozen(r.display)).toBe(true);
    expect(Object.isFrozen(r.As_min_terms)).toBe(true);
  });

  it("returns equal results for equal inputs and leaves the input untouched", () => {
    const before = { ...imperial };
    expect(compute(imperial)).toEqual(compute(imperial));
    expect(imperial).toEqual(before);
  });
});
