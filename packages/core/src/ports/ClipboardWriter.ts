/** Host clipboard access, e.g. `navigator.clipboard` or a `document.execCommand('copy')` shim. */
export interface ClipboardWriter {
  writeText(text: string): Promise<void> | void;
}
