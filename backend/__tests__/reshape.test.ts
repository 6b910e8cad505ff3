import { SchemaError } from "../src/lib/errors";
import {
  coerceValue,
  coerceYear,
  reshape,
  type WideRecord,
} from "../src/services/reshape";

const wide: WideRecord[] = [
  {
    entityName: "Germany",
    entityCode: "DEU",
    valueByYear: { "2019": "2.9e12", "2020": 3e12, "2021": 3.5e12 },
  },
  {
    entityName: "France",
    entityCode: "FRA",
    valueByYear: { "2019": "..", "2020": "", "2021": "2.9e12" },
  },
];

describe("reshape", () => {
  it("yields one row per entity and year, grouped by entity", () => {
    const rows = reshape(wide, { minYear: 2019, maxYear: 2021 });
    expect(rows).toHaveLength(6);
    expect(rows.map((r) => `${r.entityCode}:${r.year}`)).toEqual([
      "DEU:2019",
      "DEU:2020",
      "DEU:2021",
      "FRA:2019",
      "FRA:2020",
      "FRA:2021",
    ]);
  });

  it("reshapes the single-country scenario", () => {
    const rows = reshape(
      [{ entityName: "Germany", entityCode: "DEU", valueByYear: { "2020": 3e12, "2021": 3.5e12 } }],
      { minYear: 2020, maxYear: 2021 }
    );
    expect(rows).toEqual([
      { entityName: "Germany", entityCode: "DEU", year: 2020, value: 3e12 },
      { entityName: "Germany", entityCode: "DEU", year: 2021, value: 3.5e12 },
    ]);
  });

  it("keeps the missing sentinel and empty cells as null", () => {
    const rows = reshape(wide, { minYear: 2019, maxYear: 2021 });
    const france = rows.filter((r) => r.entityCode === "FRA").map((r) => r.value);
    expect(france).toEqual([null, null, 2.9e12]);
  });

  it("ignores years outside the range and non-year columns", () => {
    const rows = reshape(
      [
        {
          entityName: "Japan",
          entityCode: "JPN",
          valueByYear: { "Indicator Name": "GDP", "1999": "1", "2000": "2", "2001": "3" },
        },
      ],
      { minYear: 2000, maxYear: 2000 }
    );
    expect(rows).toEqual([{ entityName: "Japan", entityCode: "JPN", year: 2000, value: 2 }]);
  });

  it("normalizes float-valued and padded year labels", () => {
    const rows = reshape(
      [{ entityName: "Mexico", entityCode: "MEX", valueByYear: { "2010.0": 5, " 2011 ": 6 } }],
      { minYear: 2010, maxYear: 2011 }
    );
    expect(rows.map((r) => [r.year, r.value])).toEqual([
      [2010, 5],
      [2011, 6],
    ]);
  });

  it("honours custom missing sentinels", () => {
    const rows = reshape(
      [{ entityName: "Brazil", entityCode: "BRA", valueByYear: { "2000": "NA" } }],
      { minYear: 2000, maxYear: 2000 },
      { missingSentinels: ["NA"] }
    );
    expect(rows[0].value).toBeNull();
  });

  it("fails with SchemaError when a year inside the range is missing", () => {
    expect(() => reshape(wide, { minYear: 2018, maxYear: 2021 })).toThrow(SchemaError);
    expect(() => reshape(wide, { minYear: 2018, maxYear: 2021 })).toThrow(
      "Missing required year column: 2018"
    );
  });

  it("fails with SchemaError when an identity column is missing", () => {
    const noCode: WideRecord[] = [{ entityName: "Nowhere", valueByYear: { "2000": 1 } }];
    const noName: WideRecord[] = [{ entityCode: "NWH", valueByYear: { "2000": 1 } }];
    expect(() => reshape(noCode, { minYear: 2000, maxYear: 2000 })).toThrow(
      "Missing required column: entityCode"
    );
    expect(() => reshape(noName, { minYear: 2000, maxYear: 2000 })).toThrow(
      "Missing required column: entityName"
    );
  });

  it("fails with SchemaError when an entity code appears twice", () => {
    const repeated: WideRecord[] = [
      { entityName: "Germany", entityCode: "DEU", valueByYear: { "2000": 1 } },
      { entityName: "Germany (revised)", entityCode: "DEU", valueByYear: { "2000": 2 } },
    ];
    expect(() => reshape(repeated, { minYear: 2000, maxYear: 2000 })).toThrow(SchemaError);
    expect(() => reshape(repeated, { minYear: 2000, maxYear: 2000 })).toThrow(
      "Duplicate entity code: DEU"
    );
  });

  it("fails with SchemaError when two labels name the same year", () => {
    const record: WideRecord = {
      entityName: "Canada",
      entityCode: "CAN",
      valueByYear: { "2020": 1, "2020.0": 2 },
    };
    expect(() => reshape([record], { minYear: 2020, maxYear: 2020 })).toThrow(
      "Duplicate year column: 2020"
    );
  });

  it("returns an empty table for an empty input", () => {
    expect(reshape([], { minYear: 1960, maxYear: 2024 })).toEqual([]);
  });

  it("is deterministic", () => {
    const range = { minYear: 2019, maxYear: 2021 };
    expect(reshape(wide, range)).toEqual(reshape(wide, range));
  });
});

describe("coerceYear", () => {
  it.each([
    ["2020", 2020],
    ["2020.0", 2020],
    [2020, 2020],
  ])("reads %p as %p", (raw, year) => {
    expect(coerceYear(raw)).toBe(year);
  });

  it.each(["", "Country Code", "2020.5", "0x7E4", "2.02e3", "0b11111100100"])("rejects %p", (raw) => {
    expect(coerceYear(raw)).toBeUndefined();
  });
});

describe("coerceValue", () => {
  it("never turns missing data into zero or a string", () => {
    expect(coerceValue("..")).toBeNull();
    expect(coerceValue(undefined)).toBeNull();
    expect(coerceValue("n/a")).toBeNull();
    expect(coerceValue(Number.NaN)).toBeNull();
    expect(coerceValue("0")).toBe(0);
    expect(coerceValue(" 12.5 ")).toBe(12.5);
  });

  it("reads decimal and exponent forms only", () => {
    expect(coerceValue("3.5e12")).toBe(3.5e12);
    expect(coerceValue("-.5")).toBe(-0.5);
    expect(coerceValue("0x10")).toBeNull();
    expect(coerceValue("0b101")).toBeNull();
    expect(coerceValue("Infinity")).toBeNull();
  });
});
