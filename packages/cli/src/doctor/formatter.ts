// pattern: Functional Core
// Markdown-ish doctor report for terminals and bug reports

import type { DoctorReport } from "../engine/types.js";

function orNone(value: string | number | null): string {
  return value === null ? "n/a" : String(value);
}

export function formatDoctorReport(report: DoctorReport): string {
  const lines: string[] = [];

  lines.push("## Environment");
  lines.push("");
  lines.push(`- **OS**: ${report.os_name} ${report.os_version} (${report.arch})`);
  lines.push(`- **Kernel**: ${report.kernel}`);
  lines.push(
    `- **User**: uid ${orNone(report.user_id)}, euid ${orNone(report.effective_user_id)}${report.is_admin ? " (admin)" : ""}`
  );
  lines.push("");

  lines.push("### Display");
  lines.push("");
  lines.push(`- **Headless**: ${report.headless ? "yes" : "no"}`);
  lines.push(`- **Session type**: ${orNone(report.session_type)}`);
  lines.push(`- **Display server**: ${orNone(report.display_server)}`);
  lines.push("");

  lines.push("### Proxy");
  lines.push("");
  const proxies = Object.entries(report.proxy_env);
  if (proxies.length === 0) {
    lines.push("- No proxy variables set");
  } else {
    for (const [key, value] of proxies) {
      lines.push(`- **${key}**: ${value}`);
    }
  }

  return lines.join("\n");
}
