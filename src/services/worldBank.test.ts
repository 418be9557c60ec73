import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { loadConfig } from "../config";
import { DecodeError, DirectoryFetchError, TransportError } from "./errors";
import {
  directoryUrl,
  fetchCountryDirectory,
  fetchIndicatorTable,
  indicatorUrl,
  toIndicatorTable,
} from "./worldBank";

const cfg = loadConfig({});

const directoryMeta = { page: 1, pages: 1, per_page: "300", total: 2 };
const indicatorMeta = { page: 1, pages: 1, per_page: 300, total: 3, lastupdated: "2024-06-28" };

const france = {
  id: "FRA",
  iso2Code: "FR",
  name: "France",
  region: { id: "ECS", value: "Europe & Central Asia" },
  adminregion: { id: "", value: "" },
  capitalCity: "Paris",
};
const world = {
  id: "WLD",
  iso2Code: "1W",
  name: "World",
  region: { id: "NA", value: "Aggregates" },
  capitalCity: "",
};

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe("World Bank endpoints", () => {
  test("URLs use the configured base, page size and year", () => {
    expect(directoryUrl(cfg)).toBe("https://api.worldbank.org/v2/country?format=json&per_page=300");
    expect(indicatorUrl("SP.POP.TOTL", cfg)).toBe(
      "https://api.worldbank.org/v2/country/all/indicator/SP.POP.TOTL?format=json&date=2022&per_page=300"
    );
  });
});

describe("fetchCountryDirectory", () => {
  let originalFetch: typeof global.fetch;

  beforeEach(() => {
    originalFetch = global.fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  test("decodes the envelope into entries keyed by the two-letter code", async () => {
    const mock = vi.fn().mockResolvedValue(jsonResponse([directoryMeta, [france, world]]));
    global.fetch = mock;

    const entries = await fetchCountryDirectory({ config: cfg });

    expect(mock.mock.calls[0][0]).toBe(directoryUrl(cfg));
    expect(entries).toEqual([
      {
        id: "FRA",
        code: "FR",
        name: "France",
        capitalCity: "Paris",
        region: { id: "ECS", value: "Europe & Central Asia" },
      },
      {
        id: "WLD",
        code: "1W",
        name: "World",
        capitalCity: "",
        region: { id: "NA", value: "Aggregates" },
      },
    ]);
    expect(entries[0]).not.toHaveProperty("population");
  });

  test("integer per_page in the directory metadata is a decode failure", async () => {
    global.fetch = vi.fn().mockResolvedValue(jsonResponse([{ ...directoryMeta, per_page: 300 }, [france]]));

    const err = await fetchCountryDirectory({ config: cfg }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DirectoryFetchError);
    if (!(err instanceof DirectoryFetchError)) return;
    expect(err.cause).toBeInstanceOf(DecodeError);
    expect(err.cause).toMatchObject({ issues: ["0.per_page: Expected string, received number"] });
  });

  test("missing capitalCity is a decode failure", async () => {
    const noCapital = { id: france.id, iso2Code: france.iso2Code, name: france.name, region: france.region };
    global.fetch = vi.fn().mockResolvedValue(jsonResponse([directoryMeta, [noCapital]]));

    const err = await fetchCountryDirectory({ config: cfg }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DirectoryFetchError);
    if (!(err instanceof DirectoryFetchError)) return;
    expect(err.cause).toMatchObject({ issues: ["1.0.capitalCity: Required"] });
  });

  test("duplicate codes are rejected", async () => {
    global.fetch = vi.fn().mockResolvedValue(
      jsonResponse([directoryMeta, [france, { ...france, id: "FRX", name: "France again" }]])
    );

    const err = await fetchCountryDirectory({ config: cfg }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DirectoryFetchError);
    if (!(err instanceof DirectoryFetchError)) return;
    expect(err.cause).toMatchObject({ issues: ["1.1.iso2Code: duplicate country code FR"] });
  });

  test("provider error envelope surfaces its message", async () => {
    global.fetch = vi.fn().mockResolvedValue(
      jsonResponse([{ message: [{ id: "120", key: "Invalid value", value: "The provided parameter value is not valid" }] }])
    );

    const err = await fetchCountryDirectory({ config: cfg }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DirectoryFetchError);
    if (!(err instanceof DirectoryFetchError)) return;
    expect(err.cause).toMatchObject({
      issues: ["<root>: provider error: The provided parameter value is not valid"],
    });
  });

  test("HTTP failure is fatal and wraps the transport error", async () => {
    global.fetch = vi.fn().mockResolvedValue(jsonResponse(null, 500));

    const err = await fetchCountryDirectory({ config: cfg }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DirectoryFetchError);
    if (!(err instanceof DirectoryFetchError)) return;
    expect(err.cause).toBeInstanceOf(TransportError);
    expect(err.cause).toMatchObject({ status: 500 });
  });
});

describe("toIndicatorTable", () => {
  test("keeps the last value per code and drops absent values", () => {
    const table = toIndicatorTable([
      { country: { id: "FR" }, countryiso3code: "FRA", value: 1 },
      { country: { id: "DE" }, countryiso3code: "DEU", value: null },
      { country: { id: "IT" } },
      { country: { id: "FR" }, countryiso3code: "FRA", value: 2 },
      { country: { id: "ES" }, value: 0 },
    ]);
    expect([...table.entries()]).toEqual([
      ["FR", 2],
      ["ES", 0],
    ]);
  });
});

describe("fetchIndicatorTable", () => {
  let originalFetch: typeof global.fetch;

  beforeEach(() => {
    originalFetch = global.fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  test("reduces the series to a code table", async () => {
    const mock = vi.fn().mockResolvedValue(
      jsonResponse([
        indicatorMeta,
        [
          { country: { id: "FR", value: "France" }, countryiso3code: "FRA", date: "2022", value: 67971311 },
          { country: { id: "DE", value: "Germany" }, countryiso3code: "DEU", date: "2022", value: null },
          { country: { id: "1W", value: "World" }, countryiso3code: "WLD", date: "2022", value: 7950946801 },
        ],
      ])
    );
    global.fetch = mock;

    const table = await fetchIndicatorTable("SP.POP.TOTL", { config: cfg });

    expect(mock.mock.calls[0][0]).toBe(indicatorUrl("SP.POP.TOTL", cfg));
    expect(table.get("FR")).toBe(67971311);
    expect(table.get("1W")).toBe(7950946801);
    expect(table.has("DE")).toBe(false);
    expect(table.size).toBe(2);
  });

  test("a null page decodes to an empty table", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    global.fetch = vi.fn().mockResolvedValue(jsonResponse([{ ...indicatorMeta, total: 0 }, null]));

    const table = await fetchIndicatorTable("NY.GDP.MKTP.CD", { config: cfg });
    expect(table.size).toBe(0);
    expect(spy).not.toHaveBeenCalled();
  });

  test("transport failure is logged and yields an empty table", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    global.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    const table = await fetchIndicatorTable("NY.GDP.MKTP.CD", { config: cfg });

    expect(table.size).toBe(0);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe("[atlas:indicator:NY.GDP.MKTP.CD]");
    expect(spy.mock.calls[0][1]).toBeInstanceOf(TransportError);
  });

  test("directory-style string per_page is rejected by the indicator schema", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    global.fetch = vi.fn().mockResolvedValue(
      jsonResponse([{ ...indicatorMeta, per_page: "300" }, [{ country: { id: "FR" }, value: 1 }]])
    );

    const table = await fetchIndicatorTable("SP.POP.TOTL", { config: cfg });

    expect(table.size).toBe(0);
    expect(spy.mock.calls[0][1]).toBeInstanceOf(DecodeError);
  });

  test("an aborted request returns an empty table without logging", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const controller = new AbortController();
    controller.abort();
    global.fetch = vi.fn().mockRejectedValue(Object.assign(new Error("aborted"), { name: "AbortError" }));

    const table = await fetchIndicatorTable("SP.POP.TOTL", { config: cfg, signal: controller.signal });

    expect(table.size).toBe(0);
    expect(spy).not.toHaveBeenCalled();
  });
});
