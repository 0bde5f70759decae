import { formatUnixTimestamp, type CouplingReport } from "./domain.js";

export const renderTextReport = (report: CouplingReport): string => {
  const lines: string[] = [];
  lines.push("Repository Summary");
  lines.push(`  target: ${report.repository.targetPath}`);
  lines.push(`  repositoryRoot: ${report.repository.repositoryRoot}`);

  lines.push("");
  lines.push("History Window");
  lines.push(`  commits: ${report.history.commitCount} (max ${report.history.maxCommits})`);
  lines.push(`  transitions: ${report.history.transitionCount}`);
  lines.push(`  newestCommit: ${formatUnixTimestamp(report.history.newestCommitTimestamp)}`);
  lines.push(`  oldestCommit: ${formatUnixTimestamp(report.history.oldestCommitTimestamp)}`);
  lines.push(
    `  paths: accepted=${report.history.acceptedPathCount} rejected=${report.history.rejectedPathCount} deleted=${report.history.deletedPathCount}`,
  );

  lines.push("");
  lines.push("Coupling Graph");
  lines.push(`  nodes: ${report.graph.nodeCount}`);
  lines.push(`  edges: ${report.graph.edgeCount}`);
  lines.push(`  totalWeight: ${report.graph.totalWeight}`);
  lines.push(`  maxWeight: ${report.graph.maxWeight}`);

  lines.push("");
  lines.push("Strongest Couplings");
  if (report.strongestCouplings.length === 0) {
    lines.push("  none");
  }
  for (const edge of report.strongestCouplings) {
    lines.push(`  - ${edge.from} -> ${edge.to} | weight=${edge.weight}`);
  }

  lines.push("");
  lines.push("Exports");
  if (report.exports.length === 0) {
    lines.push("  none");
  }
  for (const file of report.exports) {
    lines.push(`  - ${file.kind}: ${file.path} (${file.rows} rows)`);
  }

  lines.push("");
  lines.push("Appendix");
  lines.push(`  reportSchemaVersion: ${report.schemaVersion}`);
  lines.push(`  generatedAt: ${report.generatedAt}`);

  return lines.join("\n");
};

export const renderMarkdownReport = (report: CouplingReport): string => {
  const lines: string[] = [];
  lines.push("# Co-change Coupling Report");
  lines.push("");
  lines.push("## Repository Summary");
  lines.push(`- target: \`${report.repository.targetPath}\``);
  lines.push(`- repository root: \`${report.repository.repositoryRoot}\``);

  lines.push("");
  lines.push("## History Window");
  lines.push(`- commits: \`${report.history.commitCount}\` (max \`${report.history.maxCommits}\`)`);
  lines.push(`- transitions: \`${report.history.transitionCount}\``);
  lines.push(`- newest commit: \`${formatUnixTimestamp(report.history.newestCommitTimestamp)}\``);
  lines.push(`- oldest commit: \`${formatUnixTimestamp(report.history.oldestCommitTimestamp)}\``);
  lines.push(
    `- paths: accepted \`${report.history.acceptedPathCount}\`, rejected \`${report.history.rejectedPathCount}\`, deleted \`${report.history.deletedPathCount}\``,
  );

  lines.push("");
  lines.push("## Coupling Graph");
  lines.push(`- nodes: \`${report.graph.nodeCount}\``);
  lines.push(`- edges: \`${report.graph.edgeCount}\``);
  lines.push(`- total weight: \`${report.graph.totalWeight}\``);
  lines.push(`- max weight: \`${report.graph.maxWeight}\``);

  lines.push("");
  lines.push("## Strongest Couplings");
  if (report.strongestCouplings.length === 0) {
    lines.push("- none");
  } else {
    lines.push("| from | to | weight |");
    lines.push("| --- | --- | ---: |");
    for (const edge of report.strongestCouplings) {
      lines.push(`| \`${edge.from}\` | \`${edge.to}\` | ${edge.weight} |`);
    }
  }

  lines.push("");
  lines.push("## Exports");
  lines.push(
    ...report.exports.map((file) => `- ${file.kind}: \`${file.path}\` (${file.rows} rows)`),
  );
  if (report.exports.length === 0) {
    lines.push("- none");
  }

  lines.push("");
  lines.push("## Appendix");
  lines.push(`- report schema: \`${report.schemaVersion}\``);
  lines.push(`- generated at: \`${report.generatedAt}\``);

  return lines.join("\n");
};
