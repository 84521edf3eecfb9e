import { Injectable, Logger } from "@nestjs/common";
import { marked } from "marked";
import { readFileSync } from "fs";
import { join } from "path";

@Injectable()
export class ReadmeService {
  private readonly logger = new Logger(ReadmeService.name);
  private readonly readmePath = join(process.cwd(), "README.md");
  private cachedHtml: string | null = null;

  /**
   * README.md rendered as HTML, cached after the first successful read.
   */
  async render(): Promise<string> {
    if (this.cachedHtml) {
      return this.cachedHtml;
    }

    try {
      const markdown = readFileSync(this.readmePath, "utf-8");
      const contentHtml = await marked.parse(markdown);
      this.cachedHtml = this.wrapInHtmlTemplate(contentHtml);
      return this.cachedHtml;
    } catch (error) {
      this.logger.warn(
        `Could not render README.md: ${error instanceof Error ? error.message : String(error)}`,
      );
      return this.getFallbackHtml();
    }
  }

  private wrapInHtmlTemplate(content: string): string {
    return `
<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Pool Occupancy API - Documentation</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Helvetica, Arial, sans-serif;
            line-height: 1.6;
            color: #24292e;
            max-width: 960px;
            margin: 0 auto;
            padding: 20px;
        }
        code, pre {
            background-color: #f6f8fa;
            border-radius: 3px;
            font-family: 'SFMono-Regular', Consolas, 'Liberation Mono', Menlo, monospace;
        }
        pre {
            padding: 16px;
            overflow: auto;
        }
        table {
            border-collapse: collapse;
        }
        table th, table td {
            padding: 6px 13px;
            border: 1px solid #dfe2e5;
        }
        @media (prefers-color-scheme: dark) {
            body { background-color: #0d1117; color: #c9d1d9; }
            code, pre { background-color: #161b22; }
            table th, table td { border-color: #30363d; }
        }
    </style>
</head>
<body>
    ${content}
    <hr>
    <footer>
        <a href="/v1/occupancy/latest">Latest reading</a> ·
        <a href="/v1/occupancy/history">Last 24 hours</a> ·
        <a href="/api">Swagger Docs</a>
    </footer>
</body>
</html>
    `.trim();
  }

  private getFallbackHtml(): string {
    return `
<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <title>Pool Occupancy API</title>
</head>
<body>
    <h1>🏊 Pool Occupancy API</h1>
    <p><a href="/v1/occupancy/latest">Latest reading</a> · <a href="/api">API Documentation</a></p>
</body>
</html>
    `.trim();
  }
}
