/**
 * Output buffer capacities (UTF-16 code units)
 */
export const BufferSizes = {
  /** Default output */
  stdout: 4096 * 1024,

  /** Each sink file */
  file: 8 * 1024,
} as const;
