import { writeFile } from 'node:fs/promises';

import type { Command } from 'commander';

import { loadConfigFile } from '../config/loader.js';
import { createPlaywrightProvider } from '../browser/playwright.js';
import { ActionExecutor } from '../core/executor.js';
import { WorkflowNotFoundError } from '../core/errors.js';
import { createWorkflowStore } from '../core/store.js';
import type { WorkflowStore } from '../core/store.js';
import { WorkflowEngine } from '../core/workflow.js';
import { exitCodeFor, generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import type { WorkflowRunSummary } from '../schema/index.js';
import { parseSelector } from '../selector/parse.js';
import { AntiCrawlerPolicy } from '../stealth/policy.js';
import { createFileConfigStore } from '../stealth/store.js';
import * as log from '../utils/logger.js';
import { reportFailure, resolveConfigPath } from './context.js';

// ── Stderr summary ───────────────────────────────────────────

function printSummary(summary: WorkflowRunSummary): void {
  const failed = summary.results.filter((r) => r.status === 'error').length;
  const passed = summary.results.length - failed;

  process.stderr.write(`\n--- stealthflow Result ---\n`);
  process.stderr.write(`Workflow: ${summary.workflowId}\n`);
  process.stderr.write(`Result:   ${summary.status.toUpperCase()}\n`);
  process.stderr.write(
    `Steps:    ${String(passed)} passed, ${String(failed)} failed\n`,
  );
  process.stderr.write(
    `Time:     ${(summary.durationMs / 1000).toFixed(1)}s\n`,
  );
  process.stderr.write(`Run ID:   ${summary.runId}\n\n`);
}

// ── Workflow lookup ──────────────────────────────────────────

export async function requireWorkflow(store: WorkflowStore, workflowId: string): Promise<void> {
  const listed = await store.listWorkflows();
  if (!listed.some((w) => w.id === workflowId)) {
    throw new WorkflowNotFoundError(workflowId);
  }
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a workflow defined in the config file')
    .argument('<workflowId>', 'Workflow id from the config file')
    .option('--config <path>', 'Path to config file')
    .option('--headed', 'Show the browser window')
    .option('--no-anti-crawler', 'Disable pacing and identity rotation')
    .option('--json', 'Output JSON to stdout')
    .option('--report <file>', 'Write a markdown report to this file')
    .action(
      async (
        workflowId: string,
        opts: {
          config?: string;
          headed?: true;
          antiCrawler: boolean;
          json?: true;
          report?: string;
        },
      ) => {
        try {
          // 1. Load config file
          const config = await loadConfigFile(resolveConfigPath(opts.config));

          // 2. Merge config: CLI flags take precedence
          const headless = opts.headed ? false : config.headless;
          const antiCrawlerEnabled = opts.antiCrawler && config.antiCrawler.enabled;

          // 3. Unknown ids are a usage error, not a failed run
          const workflows = createWorkflowStore(config.workflows);
          await requireWorkflow(workflows, workflowId);

          // 4. Wire collaborators
          const policy = await AntiCrawlerPolicy.load(createFileConfigStore(config.storeDir));
          const pages = createPlaywrightProvider({
            browser: config.browser,
            headless,
            viewport: config.viewport,
            proxyEnabled: config.antiCrawler.proxyEnabled,
            navigationTimeout: config.navigationTimeout,
            actionTimeout: config.actionTimeout,
          });
          const executor = new ActionExecutor({ pages, policy, antiCrawlerEnabled });
          const engine = new WorkflowEngine(workflows, executor);

          // 5. Run
          log.section(`Workflow ${workflowId}`);
          const summary = await engine.run(workflowId);
          const exitCode = exitCodeFor(summary.status);

          // 6. Markdown report if requested
          if (opts.report !== undefined) {
            await writeFile(opts.report, generateMarkdown(summary), 'utf-8');
            log.info(`Report written to ${opts.report}`);
          }

          // 7. JSON to stdout if --json
          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(summary, exitCode)) + '\n');
          }

          // 8. Summary to stderr always
          printSummary(summary);
          process.exitCode = exitCode;
        } catch (err) {
          reportFailure('Error', err);
        }
      },
    );
}

// ── List command ─────────────────────────────────────────────

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List workflows defined in the config file')
    .option('--config <path>', 'Path to config file')
    .action(async (opts: { config?: string }) => {
      try {
        const config = await loadConfigFile(resolveConfigPath(opts.config));
        const workflows = await createWorkflowStore(config.workflows).listWorkflows();

        if (workflows.length === 0) {
          process.stderr.write('No workflows defined in config\n');
          return;
        }
        for (const w of workflows) {
          process.stdout.write(`${w.id}\t${w.name}\t${String(w.stepCount)} steps\n`);
        }
      } catch (err) {
        reportFailure('Config error', err);
      }
    });
}

// ── Selector command ─────────────────────────────────────────

export function registerSelectorCommand(program: Command): void {
  program
    .command('selector')
    .description('Parse a selector and print its type and normalized value')
    .argument('<selector>', 'Selector string, e.g. "name:q" or "#login"')
    .action((selector: string) => {
      try {
        const spec = parseSelector(selector);
        process.stdout.write(`${spec.type}\t${spec.value}\n`);
      } catch (err) {
        reportFailure('Error', err);
      }
    });
}
