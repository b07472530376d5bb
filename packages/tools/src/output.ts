/** Cap on text returned to the model from a single tool call. */
export const MAX_OUTPUT_BYTES = 16 * 1024;

const isContinuationByte = (byte: number): boolean => (byte & 0xc0) === 0x80;

/**
 * Truncates a string to `limit` UTF-8 bytes, keeping the head and tail.
 * Cuts land on character boundaries, so either side may come out shorter.
 */
export function truncateOutput(output: string, limit = MAX_OUTPUT_BYTES): string {
  const bytes = Buffer.byteLength(output, "utf8");
  if (bytes <= limit) return output;

  const buf = Buffer.from(output, "utf8");
  const half = Math.floor(limit / 2);
  let headEnd = half;
  while (headEnd > 0 && isContinuationByte(buf[headEnd])) headEnd--;
  let tailStart = bytes - half;
  while (tailStart < bytes && isContinuationByte(buf[tailStart])) tailStart++;

  const head = buf.subarray(0, headEnd).toString("utf8");
  const tail = buf.subarray(tailStart).toString("utf8");
  return `${head}\n[... ${tailStart - headEnd} bytes truncated ...]\n${tail}`;
}
