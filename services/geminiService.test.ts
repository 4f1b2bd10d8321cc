import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
  Type: { OBJECT: "OBJECT", ARRAY: "ARRAY", STRING: "STRING", NUMBER: "NUMBER" },
}));

import { GeminiVehicleDetector, toPixelBox } from "./geminiService";

const frameSize = { width: 1000, height: 500 };

describe("toPixelBox()", () => {
  it("maps a 0-1000 [ymin, xmin, ymax, xmax] box onto the frame", () => {
    expect(toPixelBox([100, 200, 300, 400], frameSize)).toEqual({ x: 200, y: 50, width: 200, height: 100 });
  });

  it("clamps coordinates outside the normalized range", () => {
    expect(toPixelBox([-50, 900, 600, 1200], frameSize)).toEqual({ x: 900, y: 0, width: 100, height: 300 });
  });
});

describe("GeminiVehicleDetector", () => {
  beforeEach(() => {
    generateContent.mockReset();
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const makeDetector = () => new GeminiVehicleDetector({ frameSize, minVehicleArea: 500, apiKey: "test-key" });

  it("keeps vehicles above the minimum area", async () => {
    generateContent.mockResolvedValue({
      text: JSON.stringify({
        detections: [
          { label: "Car", box_2d: [100, 200, 300, 400] },
          { label: "person", box_2d: [0, 0, 500, 500] },
          { label: "truck", box_2d: [0, 0, 10, 10] },
        ],
      }),
    });

    const boxes = await makeDetector().detect("ZnJhbWU=");

    expect(boxes).toEqual([{ x: 200, y: 50, width: 200, height: 100 }]);
    expect(generateContent).toHaveBeenCalledWith(expect.objectContaining({ model: "gemini-2.5-flash" }));
  });

  it("returns an empty frame when the response has the wrong shape", async () => {
    generateContent.mockResolvedValue({ text: JSON.stringify({ detections: [{ label: "car" }] }) });

    expect(await makeDetector().detect("ZnJhbWU=")).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("returns an empty frame when the request fails", async () => {
    generateContent.mockRejectedValue(new Error("quota exceeded"));

    expect(await makeDetector().detect("ZnJhbWU=")).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("never calls the API without a key", async () => {
    vi.stubEnv("API_KEY", "");
    const detector = new GeminiVehicleDetector({ frameSize, minVehicleArea: 500 });

    expect(await detector.detect("ZnJhbWU=")).toEqual([]);
    expect(generateContent).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith("[Gemini] API key is missing, every frame will come back empty");
  });
});
