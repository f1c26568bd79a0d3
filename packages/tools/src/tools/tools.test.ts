import { describe, it, expect } from "vitest";
import { readWeather, WEATHER_CONDITIONS, formatWeather } from "./weather.js";
import { quoteStock, formatQuote } from "./stock.js";
import { searchKnowledgeBase } from "./knowledge-base.js";
import { calculate, evaluateExpression } from "./calculator.js";
import { lookupRecord } from "./database.js";
import { roundTo } from "../seeded-random.js";

describe("get_weather", () => {
  it("is stable per city and within plausible ranges", () => {
    const first = readWeather("Seattle");
    const second = readWeather("Seattle");

    expect(first).toEqual(second);
    expect(first.City).toBe("Seattle");
    expect(WEATHER_CONDITIONS).toContain(first.Condition);
    expect(first.TemperatureCelsius).toBeGreaterThanOrEqual(5);
    expect(first.TemperatureCelsius).toBeLessThanOrEqual(40);
    expect(first.Humidity).toBeGreaterThanOrEqual(30);
    expect(first.Humidity).toBeLessThan(90);
    expect(first.WindSpeedKmh).toBeGreaterThanOrEqual(0);
    expect(first.WindSpeedKmh).toBeLessThanOrEqual(30);
  });

  it("formats a one-line summary", () => {
    const line = formatWeather({
      City: "Oslo",
      TemperatureCelsius: 7.5,
      Condition: "Rainy",
      Humidity: 81,
      WindSpeedKmh: 12.3,
    });
    expect(line).toBe("Oslo: 7.5°C, Rainy, humidity 81%, wind 12.3 km/h");
  });
});

describe("get_stock_price", () => {
  it("uses the reference price for known symbols", () => {
    const quote = quoteStock("MSFT");
    expect(quote.Symbol).toBe("MSFT");
    expect(quote.Price).toBe(431.2);
    expect(quote.ChangePercent).toBe(roundTo((quote.Change / quote.Price) * 100, 2));
    expect(Math.abs(quote.Change)).toBeLessThanOrEqual(5);
  });

  it("synthesises a stable price for other symbols", () => {
    const quote = quoteStock("ZZZZ");
    expect(quote).toEqual(quoteStock("ZZZZ"));
    expect(quote.Price).toBeGreaterThanOrEqual(100);
    expect(quote.Price).toBeLessThanOrEqual(300);
  });

  it("formats sign and decimals", () => {
    expect(formatQuote({ Symbol: "AAPL", Price: 229.85, Change: 1.5, ChangePercent: 0.65 })).toBe(
      "AAPL: $229.85 (+1.50, 0.65%)"
    );
    expect(formatQuote({ Symbol: "TSLA", Price: 262.7, Change: -2.25, ChangePercent: -0.86 })).toBe(
      "TSLA: $262.70 (-2.25, -0.86%)"
    );
  });
});

describe("search_knowledge_base", () => {
  it("matches on topic or content, ignoring case", () => {
    const result = searchKnowledgeBase("REFUND");
    expect(result).toMatchObject({ query: "REFUND" });
    expect("results" in result && result.results.map((r) => r.topic)).toEqual(["refund policy"]);
  });

  it("matches a question that mentions a topic", () => {
    const result = searchKnowledgeBase("What is your shipping time?");
    expect("results" in result && result.results.map((r) => r.topic)).toEqual(["shipping"]);
  });

  it("says so when nothing matches", () => {
    expect(searchKnowledgeBase("quantum teleportation")).toEqual({
      query: "quantum teleportation",
      message: "No relevant information found.",
    });
  });
});

describe("calculate", () => {
  it("respects precedence, parentheses and unary minus", () => {
    expect(evaluateExpression("2 + 3 * 4")).toBe(14);
    expect(evaluateExpression("(10 + 5) / 4")).toBe(3.75);
    expect(evaluateExpression("-(2+3)*2")).toBe(-10);
    expect(evaluateExpression("7 % 4")).toBe(3);
    expect(evaluateExpression(".5 * 4")).toBe(2);
  });

  it("returns an error payload instead of throwing", () => {
    expect(calculate("1/0")).toEqual({ expression: "1/0", error: "Division by zero" });
    expect(calculate("2 +")).toEqual({
      expression: "2 +",
      error: "Expected a number but found end of input",
    });
    expect(calculate("2 $ 3")).toEqual({ expression: "2 $ 3", error: "Unexpected '$' at position 2" });
    expect(calculate("(1+2")).toEqual({ expression: "(1+2", error: "Missing closing parenthesis" });
    expect(calculate("6*7")).toEqual({ expression: "6*7", result: "42" });
  });
});

describe("get_database_record", () => {
  it("finds known records case-insensitively", () => {
    const result = lookupRecord("Employees", "emp-001");
    expect(result).toEqual({
      recordId: "emp-001",
      table: "Employees",
      data: {
        Name: "Dana Whitfield",
        Department: "Platform Engineering",
        Role: "Staff Engineer",
        StartDate: "2020-09-01",
      },
    });
  });

  it("explains a miss", () => {
    expect(lookupRecord("orders", "ORD-1")).toEqual({
      recordId: "ORD-1",
      table: "orders",
      error: "Record 'ORD-1' not found in table 'orders'",
      suggestion: "Check the record ID and table name",
    });
  });
});
