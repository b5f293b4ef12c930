/**
 * Compound binary file signature.
 *
 * Legacy .xls workbooks (and .doc/.ppt files) are stored inside an OLE2
 * compound binary container, which always starts with these 8 bytes.
 */
export const XLS_SIGNATURE: readonly number[] = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]

/**
 * Check if the data indicates an XLS file
 */
export function isFileXls(data: Uint8Array): boolean {
  if (data.length < XLS_SIGNATURE.length) return false

  return XLS_SIGNATURE.every((byte, i) => data[i] === byte)
}
