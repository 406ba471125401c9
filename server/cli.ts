#!/usr/bin/env node
import { Command, Option } from "commander";
import type { AuditProfile } from "@shared/audit-types";
import { runAudit, HttpFetchPort, renderReportText } from "./audit";
import { config } from "./config";

const program = new Command();

program
  .name("site-audit")
  .description("Audit a website for performance, SEO, UX, accessibility and conversion")
  .version("1.0.0")
  .argument("<url>", "The URL of the site to audit")
  .addOption(new Option("--profile <profile>", "Crawl profile").choices(["full", "summary"]).default("full"))
  .addOption(new Option("--format <format>", "Output format").choices(["json", "text"]).default("json"))
  .option("--userAgent <string>", "User agent string", config.USER_AGENT)
  .action(async (url: string, options: { profile: AuditProfile; format: "json" | "text"; userAgent: string }) => {
    try {
      const report = await runAudit(
        { url, profile: options.profile },
        { fetcher: new HttpFetchPort(options.userAgent), userAgent: options.userAgent }
      );

      console.log(options.format === "text" ? renderReportText(report) : JSON.stringify(report, null, 2));

      process.exit(0);
    } catch (error: unknown) {
      console.error(
        JSON.stringify(
          {
            error: true,
            message: error instanceof Error ? error.message : "Unknown error occurred",
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
