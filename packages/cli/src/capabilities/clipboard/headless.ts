// pattern: Functional Core
// Clipboard for environments without a display. Never touches the OS.

import { CapabilityError } from "../../utils/errors.js";

import { ClipboardImplementation } from "./base.js";

const REASON = "clipboard unavailable in headless environment";

export class HeadlessClipboard extends ClipboardImplementation {
  readonly name = "headless";

  async readText(): Promise<string> {
    throw new CapabilityError("unsupported", REASON);
  }

  async writeText(_text: string): Promise<void> {
    throw new CapabilityError("unsupported", REASON);
  }
}
