import stringWidth from "string-width";

// CJK-safe truncation: truncate to N visual columns, append "…" if needed
export function truncateToWidth(str: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (stringWidth(str) <= maxWidth) return str;
  let width = 0;
  for (let i = 0; i < str.length; i++) {
    const charWidth = stringWidth(str[i]);
    if (width + charWidth > maxWidth - 1) {
      return str.slice(0, i) + "…";
    }
    width += charWidth;
  }
  return str;
}

// CJK-safe padding: pad to N visual columns with spaces
export function padEndToWidth(str: string, targetWidth: number): string {
  const currentWidth = stringWidth(str);
  return currentWidth >= targetWidth
    ? str
    : str + " ".repeat(targetWidth - currentWidth);
}

// Fit a cell exactly: truncate, then pad; selected rows paint their full width
export function fitToWidth(str: string, width: number): string {
  return padEndToWidth(truncateToWidth(str, width), width);
}
