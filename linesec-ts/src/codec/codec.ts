// Codec turns structured values into single-line text and back.
export type Codec = {
  serialize(value: unknown): string;
  deserialize(text: string): unknown;
};

// jsonCodec is the default codec. JSON.stringify never emits raw line breaks, so
// every value fits in one frame.
export const jsonCodec: Codec = {
  serialize(value: unknown): string {
    const text = JSON.stringify(value);
    if (text === undefined) throw new Error(`cannot serialize ${typeof value}`);
    return text;
  },
  deserialize(text: string): unknown {
    return JSON.parse(text);
  }
};
