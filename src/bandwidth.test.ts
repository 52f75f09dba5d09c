import { describe, it, expect, vi } from "vitest";
import { BandwidthMeter, formatRate, WINDOW_SIZE } from "./bandwidth.js";

describe("BandwidthMeter", () => {
  it("publishes nothing before the window fills", () => {
    const onUpdate = vi.fn();
    const meter = new BandwidthMeter(onUpdate);
    for (let i = 0; i < WINDOW_SIZE - 1; i++) meter.addSample(1, 100);
    expect(onUpdate).not.toHaveBeenCalled();
    expect(meter.median).toBeNull();
  });

  it("publishes the median of a full window, ignoring outliers", () => {
    const onUpdate = vi.fn();
    const meter = new BandwidthMeter(onUpdate);
    // rates 1..16 bytes/ms, shuffled, with two wild outliers
    const rates = [16, 3, 9, 1, 12, 5, 7, 14, 2, 10, 8, 4, 11, 6, 13, 15];
    rates[0] = 100_000;
    rates[3] = 0;
    for (const rate of rates) meter.addSample(10, rate * 10);

    // sorted: 0,2,3,4,5,6,7,8,9,10,11,12,13,14,15,100000 → index 8
    expect(onUpdate).toHaveBeenCalledWith(9);
    expect(meter.median).toBe(9);
  });

  it("starts a fresh window after publishing", () => {
    const onUpdate = vi.fn();
    const meter = new BandwidthMeter(onUpdate);
    for (let i = 0; i < WINDOW_SIZE; i++) meter.addSample(1, 1);
    for (let i = 0; i < WINDOW_SIZE; i++) meter.addSample(1, 4);
    expect(onUpdate.mock.calls).toEqual([[1], [4]]);
  });

  it("skips samples with no elapsed time", () => {
    const meter = new BandwidthMeter();
    for (let i = 0; i < WINDOW_SIZE; i++) meter.addSample(0, 1000);
    expect(meter.median).toBeNull();
  });
});

describe("formatRate", () => {
  it("renders MB/s with one decimal", () => {
    // 1 MiB per second = 1048.576 bytes/ms
    expect(formatRate(1048.576)).toBe("1.0 MB/s");
    expect(formatRate(0)).toBe("0.0 MB/s");
    expect(formatRate(5242.88)).toBe("5.0 MB/s");
  });
});
