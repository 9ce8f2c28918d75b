import pc from 'picocolors';
import { printTable } from './index';

export interface OutputResult {
  status?: 'SUCCESS' | 'FAILURE';
  /** One-line headline */
  summary?: string;
  /** Labelled paths, e.g. `Output` or `Archive` */
  artifacts?: Record<string, string | undefined>;
  /** Bulleted detail lines */
  items?: string[];
  nextSteps?: string[];
  [key: string]: unknown;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      this.renderHuman(data);
    }
  }

  /**
   * Rows as a table, or as a JSON array in JSON mode. `empty` is printed when
   * there are no rows.
   */
  table(rows: Record<string, string>[], empty: string): void {
    if (this.isJson) {
      console.log(JSON.stringify(rows, null, 2));
    } else if (rows.length === 0) {
      console.log(pc.yellow(empty));
    } else {
      printTable(rows);
    }
  }

  private renderHuman(data: OutputResult): void {
    if (data.status === 'FAILURE') {
      console.log(`\n${pc.red(`❌ ${data.summary ?? 'Failed.'}`)}`);
    } else if (data.status === 'SUCCESS') {
      console.log(`\n${pc.green(`✅ ${data.summary ?? 'Done.'}`)}`);
    } else if (data.summary) {
      console.log(data.summary);
    }

    if (data.items && data.items.length > 0) {
      data.items.forEach((item) => console.log(`  - ${item}`));
    }

    const artifacts = Object.entries(data.artifacts ?? {}).filter(
      (entry): entry is [string, string] => entry[1] !== undefined,
    );
    if (artifacts.length > 0) {
      console.log(pc.bold('\nArtifacts:'));
      artifacts.forEach(([label, location]) => console.log(`  ${label}: ${location}`));
    }

    if (data.nextSteps && data.nextSteps.length > 0) {
      console.log(pc.bold('\nNext steps:'));
      data.nextSteps.forEach((step) => console.log(`  - ${step}`));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
