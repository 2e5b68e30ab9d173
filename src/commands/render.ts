import chalk, { type ChalkInstance } from "chalk";
import { hasFailures } from "../core/summary.js";
import type { GitLabProject, GitLabTopic } from "../types/gitlab.js";
import { STATUS, type ProjectResult, type ProjectStatus, type Summary } from "../types/result.js";
import type { MergeCandidate, MergeEvent, MergeSummary } from "./merge.js";

const RULE = "━".repeat(40);

const ICONS: Record<ProjectStatus, string> = {
  [STATUS.CREATED]: "✓",
  [STATUS.SKIPPED_EXISTS]: "→",
  [STATUS.SKIPPED_DRAFT]: "⊘",
  [STATUS.SKIPPED_NO_BRANCH]: "⚠",
  [STATUS.SKIPPED_NO_CHANGE]: "≡",
  [STATUS.ERROR]: "✗",
};

export function statusIcon(status: ProjectStatus): string {
  return ICONS[status];
}

function paintStatus(status: ProjectStatus, text: string, c: ChalkInstance): string {
  switch (status) {
    case STATUS.CREATED:
      return c.green(text);
    case STATUS.ERROR:
      return c.red(text);
    case STATUS.SKIPPED_NO_BRANCH:
      return c.yellow(text);
    default:
      return c.cyan(text);
  }
}

export function truncate(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/** One block per project, followed by a blank line. */
export function renderResult(result: ProjectResult, c: ChalkInstance = chalk): string {
  const lines = [`[${result.project}] ${paintStatus(result.status, `${statusIcon(result.status)} ${result.status}`, c)}`];
  if (result.details) lines.push(`  ${result.details}`);
  if (result.errorMessage) lines.push(`  ${c.red(`Error: ${result.errorMessage}`)}`);
  return lines.join("\n") + "\n\n";
}

export function renderSummary(summary: Summary, c: ChalkInstance = chalk): string {
  const lines = [
    c.bold("Summary:"),
    `  Total projects: ${summary.total}`,
    `  Created: ${summary.created}`,
    `  Skipped (exists): ${summary.skippedExists}`,
    `  Skipped (draft): ${summary.skippedDraft}`,
    `  Skipped (no changes): ${summary.skippedNoChange}`,
    `  Skipped (no branch): ${summary.skippedNoBranch}`,
    `  Errors: ${summary.errors}`,
    "",
    hasFailures(summary) ? c.red("✗ Completed with errors") : c.green("✓ Completed successfully"),
  ];
  return lines.join("\n") + "\n";
}

/** JSONL record for one project; `code` is the status token. */
export function resultLine(result: ProjectResult): string {
  const level = result.status === STATUS.ERROR ? "error" : "info";
  return JSON.stringify({ level, code: result.status, ...result }) + "\n";
}

export function summaryLine(summary: Summary): string {
  const level = hasFailures(summary) ? "error" : "info";
  return JSON.stringify({ level, code: "SUMMARY", ...summary }) + "\n";
}

export function renderTopics(topics: GitLabTopic[], c: ChalkInstance = chalk): string {
  const out = [`\n📚 ${c.bold.magenta("GitLab Topics")}\n`];
  if (topics.length === 0) {
    out.push(c.dim("No topics found."));
    return out.join("\n") + "\n";
  }

  topics.forEach((topic, i) => {
    let heading = `${c.bold(`${i + 1}.`)} ${c.bold.magenta(topic.name)}`;
    if (topic.title && topic.title !== topic.name) heading += ` - ${topic.title}`;
    out.push(heading);

    if (topic.total_projects_count > 0) {
      out.push(`   ${c.magenta(`📦 ${topic.total_projects_count} projects`)}`);
    }
    if (topic.description && topic.description !== topic.title) {
      out.push(`   ${c.dim(truncate(topic.description))}`);
    }
    out.push("");
  });

  return out.join("\n") + "\n";
}

export function renderProjects(topic: string, projects: GitLabProject[], c: ChalkInstance = chalk): string {
  const out = [`\n📁 ${c.bold.magenta(`Projects in topic: ${topic}`)}\n`];
  if (projects.length === 0) {
    out.push(c.dim("No projects found for this topic."));
    return out.join("\n") + "\n";
  }

  projects.forEach((project, i) => {
    out.push(`${c.bold(`${i + 1}.`)} ${c.bold(project.name)}`);
    out.push(`   ${c.dim(project.path_with_namespace)}`);
    if (project.description) out.push(`   ${c.italic.dim(truncate(project.description))}`);

    const others = project.topics.filter((t) => t !== topic);
    if (others.length > 0) out.push(`   ${others.map((t) => c.bgMagenta.white(` ${t} `)).join(" ")}`);

    out.push(`   ${c.underline.green(project.web_url)}`);
    out.push("");
  });

  return out.join("\n") + "\n";
}

export function renderMergeCandidate(candidate: MergeCandidate, c: ChalkInstance = chalk): string {
  const { project, mergeRequest: mr } = candidate;
  return [
    c.cyan(RULE),
    `${c.bold.cyan("Project:")} ${project.path_with_namespace}`,
    `${c.bold.cyan("MR Title:")} ${mr.title}`,
    `${c.bold.cyan("Branches:")} ${mr.source_branch} → ${mr.target_branch}`,
    `${c.bold.cyan("URL:")} ${mr.web_url}`,
    c.cyan(RULE),
  ].join("\n") + "\n";
}

export function renderMergeEvent(event: MergeEvent, c: ChalkInstance = chalk): string {
  switch (event.kind) {
    case "merged":
      return c.green("✓ Successfully merged!") + "\n\n";
    case "skipped":
      return c.yellow("⊘ Skipped") + "\n\n";
    case "merge-failed":
      return c.red(`✗ Failed to merge: ${event.error}`) + "\n\n";
    case "list-failed":
      return c.red(`✗ Error fetching MRs for ${event.project.path_with_namespace}: ${event.error}`) + "\n";
  }
}

/** JSONL record for one merge outcome; prompts never go to stdout in this mode. */
export function mergeEventLine(event: MergeEvent): string {
  switch (event.kind) {
    case "list-failed":
      return (
        JSON.stringify({
          level: "error",
          code: "LIST_FAILED",
          project: event.project.path_with_namespace,
          error: event.error,
        }) + "\n"
      );
    case "merged":
    case "skipped":
    case "merge-failed": {
      const { project, mergeRequest: mr } = event.candidate;
      return (
        JSON.stringify({
          level: event.kind === "merge-failed" ? "error" : "info",
          code: event.kind.toUpperCase().replace("-", "_"),
          project: project.path_with_namespace,
          mergeRequestIid: mr.iid,
          mergeRequestUrl: mr.web_url,
          ...(event.kind === "merge-failed" ? { error: event.error } : {}),
        }) + "\n"
      );
    }
  }
}

export function mergeSummaryLine(summary: MergeSummary): string {
  const level = summary.errors > 0 ? "error" : "info";
  return JSON.stringify({ level, code: "SUMMARY", ...summary }) + "\n";
}

export function renderMergeSummary(summary: MergeSummary, c: ChalkInstance = chalk): string {
  const lines = [
    c.cyan(RULE),
    c.bold.cyan("📊 Summary"),
    c.cyan(RULE),
    c.green(`✓ Merged:  ${summary.merged}`),
    c.yellow(`⊘ Skipped: ${summary.skipped}`),
  ];
  if (summary.errors > 0) lines.push(c.red(`✗ Errors:  ${summary.errors}`));
  lines.push(c.cyan(RULE));
  return lines.join("\n") + "\n";
}
