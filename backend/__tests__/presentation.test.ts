import {
  formatBillions,
  formatGrowth,
  toChartSeries,
  toMetricTile,
} from "../src/services/presentation";

describe("formatBillions", () => {
  it("renders whole billions with separators", () => {
    expect(formatBillions(3.5e12)).toBe("3,500B");
    expect(formatBillions(1.2345e9)).toBe("1B");
    expect(formatBillions(0)).toBe("0B");
  });

  it("renders absent values as n/a", () => {
    expect(formatBillions(null)).toBe("n/a");
  });
});

describe("formatGrowth", () => {
  it("renders two decimals with a multiplier sign", () => {
    expect(formatGrowth(2.5)).toBe("2.50x");
    expect(formatGrowth(3.5e12 / 3e12)).toBe("1.17x");
    expect(formatGrowth(1234.5)).toBe("1,234.50x");
  });

  it("renders absent growth as n/a", () => {
    expect(formatGrowth(null)).toBe("n/a");
  });
});

describe("toMetricTile", () => {
  it("labels the end value and growth", () => {
    expect(
      toMetricTile({ entityCode: "DEU", startValue: 3e12, endValue: 3.5e12, growthRatio: 3.5e12 / 3e12 })
    ).toEqual({ label: "DEU GDP", value: "3,500B", delta: "1.17x", deltaColor: "normal" });
  });

  it("switches the delta off when growth is absent", () => {
    expect(
      toMetricTile({ entityCode: "FRA", startValue: null, endValue: 2.9e12, growthRatio: null })
    ).toEqual({ label: "FRA GDP", value: "2,900B", delta: "n/a", deltaColor: "off" });
  });
});

describe("toChartSeries", () => {
  it("groups points by entity with tooltips", () => {
    const series = toChartSeries([
      { entityName: "Germany", entityCode: "DEU", year: 2020, value: 1 },
      { entityName: "France", entityCode: "FRA", year: 2020, value: null },
      { entityName: "Germany", entityCode: "DEU", year: 2021, value: 2 },
    ]);

    expect(series.map((s) => s.entityCode)).toEqual(["DEU", "FRA"]);
    expect(series[0]).toEqual({
      entityCode: "DEU",
      entityName: "Germany",
      points: [
        { year: 2020, value: 1, tooltip: { entityName: "Germany", year: 2020, value: 1 } },
        { year: 2021, value: 2, tooltip: { entityName: "Germany", year: 2021, value: 2 } },
      ],
    });
  });
});
