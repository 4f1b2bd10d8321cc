import { GoogleGenAI, Type, type Schema } from "@google/genai";
import { z } from "zod";
import type { BoundingBox, FrameSize } from "../types";
import { getBoxArea } from "../utils/mathUtils";

export interface VehicleDetector {
  detect(base64Jpeg: string): Promise<BoundingBox[]>;
}

export interface GeminiDetectorOptions {
  frameSize: FrameSize;
  minVehicleArea: number;
  apiKey?: string;
  model?: string;
}

export const VEHICLE_LABELS = new Set([
  "car",
  "truck",
  "bus",
  "van",
  "motorcycle",
  "motorbike",
  "pickup",
  "vehicle",
]);

const NORMALIZED_SCALE = 1000;

// Schema for the vehicle detection response
const detectionSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    detections: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          label: {
            type: Type.STRING,
            description: "The vehicle class (car, truck, bus, van, motorcycle).",
          },
          box_2d: {
            type: Type.ARRAY,
            items: { type: Type.NUMBER },
            description: "Bounding box coordinates [ymin, xmin, ymax, xmax] normalized to 1000x1000.",
          },
        },
        required: ["label", "box_2d"],
      },
    },
  },
  required: ["detections"],
};

const responseSchema = z.object({
  detections: z
    .array(
      z.object({
        label: z.string(),
        box_2d: z.tuple([z.number(), z.number(), z.number(), z.number()]),
      })
    )
    .default([]),
});

const clampNormalized = (v: number): number => Math.min(NORMALIZED_SCALE, Math.max(0, v));

// [ymin, xmin, ymax, xmax] on a 0-1000 scale -> integer pixel box
export const toPixelBox = (
  box2d: readonly [number, number, number, number],
  frameSize: FrameSize
): BoundingBox => {
  const [ymin, xmin, ymax, xmax] = box2d.map(clampNormalized);
  const x = Math.round((xmin / NORMALIZED_SCALE) * frameSize.width);
  const y = Math.round((ymin / NORMALIZED_SCALE) * frameSize.height);
  return {
    x,
    y,
    width: Math.round((xmax / NORMALIZED_SCALE) * frameSize.width) - x,
    height: Math.round((ymax / NORMALIZED_SCALE) * frameSize.height) - y,
  };
};

/**
 * Vehicle detector backed by Gemini. Failures are logged and yield an empty
 * frame so one bad response does not stop the session.
 */
export class GeminiVehicleDetector implements VehicleDetector {
  private readonly ai: GoogleGenAI | null;
  private readonly model: string;

  constructor(private readonly options: GeminiDetectorOptions) {
    const apiKey = options.apiKey ?? process.env.API_KEY;
    if (!apiKey) {
      console.warn("[Gemini] API key is missing, every frame will come back empty");
    }
    this.ai = apiKey ? new GoogleGenAI({ apiKey }) : null;
    // gemini-2.5-flash for speed/latency balance
    this.model = options.model ?? "gemini-2.5-flash";
  }

  async detect(base64Jpeg: string): Promise<BoundingBox[]> {
    if (!this.ai) return [];

    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: {
          parts: [
            {
              inlineData: {
                mimeType: "image/jpeg",
                data: base64Jpeg,
              },
            },
            {
              text: "Detect every road vehicle in this traffic camera frame. For each one, provide the label and the bounding box [ymin, xmin, ymax, xmax] on a 1000x1000 scale.",
            },
          ],
        },
        config: {
          responseMimeType: "application/json",
          responseSchema: detectionSchema,
          systemInstruction: "You are a real-time vehicle detection engine for a fixed traffic camera. Be precise with bounding boxes.",
          temperature: 0.3, // Low temperature for consistency
        },
      });

      const jsonText = response.text;
      if (!jsonText) return [];

      const parsed = responseSchema.safeParse(JSON.parse(jsonText));
      if (!parsed.success) {
        console.error("[Gemini] Unexpected response shape:", parsed.error.issues);
        return [];
      }

      return parsed.data.detections
        .filter((d) => VEHICLE_LABELS.has(d.label.trim().toLowerCase()))
        .map((d) => toPixelBox(d.box_2d, this.options.frameSize))
        .filter((box) => box.width > 0 && box.height > 0 && getBoxArea(box) > this.options.minVehicleArea);
    } catch (error) {
      console.error("[Gemini] Detection error:", error);
      return [];
    }
  }
}
