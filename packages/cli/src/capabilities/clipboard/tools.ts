// pattern: Functional Core
// External clipboard utilities per platform, in preference order.

export interface ClipboardTool {
  command: string;
  args: readonly string[];
}

export interface ClipboardToolset {
  read: readonly ClipboardTool[];
  write: readonly ClipboardTool[];
}

const MACOS_TOOLS: ClipboardToolset = {
  read: [{ command: "pbpaste", args: [] }],
  write: [{ command: "pbcopy", args: [] }],
};

const LINUX_TOOLS: ClipboardToolset = {
  read: [
    { command: "xclip", args: ["-selection", "clipboard", "-o"] },
    { command: "xsel", args: ["--clipboard", "--output"] },
    { command: "wl-paste", args: [] },
  ],
  write: [
    { command: "xclip", args: ["-selection", "clipboard"] },
    { command: "xsel", args: ["--clipboard", "--input"] },
    { command: "wl-copy", args: [] },
  ],
};

/**
 * Clipboard utilities for a platform, or null where none are known
 */
export function getClipboardTools(
  platform: NodeJS.Platform = process.platform
): ClipboardToolset | null {
  switch (platform) {
    case "darwin":
      return MACOS_TOOLS;
    case "linux":
      return LINUX_TOOLS;
    default:
      return null;
  }
}

export function describeTools(tools: readonly ClipboardTool[]): string {
  const names = tools.map(tool => tool.command);
  if (names.length <= 1) {
    return names.join("");
  }
  return `${names.slice(0, -1).join(", ")}, or ${names[names.length - 1]}`;
}
