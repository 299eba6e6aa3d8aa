import { describe, expect, test } from "@jest/globals";
import { FakeTransport } from "../../../testing/fake.transport";
import { binanceDiffTopic, createBinanceSpotFeed, normalizeBinanceSymbol } from "./spot.feed";

describe("normalizeBinanceSymbol", () => {
  test.each([
    ["btcusdt", "BTCUSDT"],
    ["BTC/USDT", "BTCUSDT"],
    ["eth-usdt", "ETHUSDT"],
    [" sol_usdc ", "SOLUSDC"],
  ])("%s -> %s", (input, expected) => {
    expect(normalizeBinanceSymbol(input)).toBe(expected);
  });

  test("rejects characters a symbol cannot contain", () => {
    expect(() => normalizeBinanceSymbol("BTC.USDT")).toThrow('Invalid Binance symbol: "BTC.USDT"');
    expect(() => normalizeBinanceSymbol("")).toThrow("Invalid Binance symbol");
  });
});

describe("binanceDiffTopic", () => {
  test("uses the 100ms stream unless 1000ms is asked for", () => {
    expect(binanceDiffTopic("BTCUSDT", 100)).toBe("btcusdt@depth@100ms");
    expect(binanceDiffTopic("BTCUSDT", 1000)).toBe("btcusdt@depth");
  });
});

describe("createBinanceSpotFeed", () => {
  test("wires the given transport and the update cadence", () => {
    const transport = new FakeTransport();
    const feed = createBinanceSpotFeed({ transport, updateMs: 1000 });

    expect(feed.exchange).toBe("binance-spot");
    expect(feed.transport).toBe(transport);
    expect(feed.diffTopic("ETHUSDT")).toBe("ethusdt@depth");
    expect(feed.normalizeSymbol("eth/usdt")).toBe("ETHUSDT");
  });
});
