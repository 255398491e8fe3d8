import { encode } from "@toon-format/toon";
import { z } from "zod";
import { OutputFormatSchema } from "./config";

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface SerializationOptions {
  format?: OutputFormat;
  pretty?: boolean;
}

export class ToonSerializer {
  static serialize(obj: unknown, options: SerializationOptions = {}): string {
    const format = options.format || "json";

    switch (format) {
      case "toon":
        return encode(obj);

      case "json":
      default:
        return options.pretty ? JSON.stringify(obj, null, 2) : JSON.stringify(obj);
    }
  }
}

export function parseFormat(value: string | undefined): OutputFormat {
  return OutputFormatSchema.parse(value ?? "json");
}
