import pc from 'picocolors';
import type { ApplyReport, FileReport, PatchDiagnostic } from '@hunkwise/shared';
import type { ApplyCheckReport, FormatReport } from '@hunkwise/core';

const MAX_LISTED_FILES = 20;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderFormat(report: FormatReport): void {
    if (this.isJson) {
      this.renderJson(report);
      return;
    }
    if (report.ok) {
      console.log(`${pc.green('✅ Patch is well-formed.')} ${pc.gray(`(${plural(report.fileCount, 'file')})`)}`);
    } else {
      console.log(pc.red('❌ Patch is not well-formed.'));
    }
    this.renderDiagnostics(report.diagnostics);
  }

  renderCheck(report: ApplyCheckReport): void {
    if (this.isJson) {
      this.renderJson(report);
      return;
    }
    this.renderFiles(report.files);
    this.renderDiagnostics(unlisted(report));
    if (report.ok) {
      console.log(`\n${pc.green('✅ Patch applies.')}`);
    } else {
      console.log(`\n${pc.red('❌ Patch does not apply.')}`);
    }
  }

  renderApply(report: ApplyReport, dryRun: boolean): void {
    if (this.isJson) {
      this.renderJson(report);
      return;
    }
    this.renderFiles(report.files);
    this.renderDiagnostics(unlisted(report));

    if (dryRun) {
      console.log(
        `\n${report.ok ? pc.green('✅ Dry run: patch applies.') : pc.red('❌ Dry run: patch does not apply.')}`,
      );
      return;
    }

    if (report.filesChanged.length > 0) {
      console.log(pc.bold('\nChanged files:'));
      report.filesChanged.slice(0, MAX_LISTED_FILES).forEach((file) => console.log(`  - ${file}`));
      if (report.filesChanged.length > MAX_LISTED_FILES) {
        console.log(`  ... and ${report.filesChanged.length - MAX_LISTED_FILES} more.`);
      }
    } else {
      console.log(pc.gray('\nNothing was written.'));
    }

    if (report.ok) {
      console.log(`\n${pc.green('✅ Patch applied.')}`);
    } else {
      console.log(`\n${pc.red('❌ Patch did not apply cleanly.')}`);
    }
  }

  /** Prints patch text unchanged, or wrapped in JSON */
  renderPatch(text: string): void {
    if (this.isJson) {
      this.renderJson({ patch: text });
      return;
    }
    process.stdout.write(text);
  }

  private renderJson(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  private renderFiles(files: readonly FileReport[]): void {
    for (const file of files) {
      const verdict = file.verdict;
      switch (verdict.kind) {
        case 'WouldApplyCleanly':
          console.log(`  ${pc.green('✔')} ${file.path}`);
          break;
        case 'WouldApplyWithOffset':
          console.log(
            `  ${pc.yellow('~')} ${file.path} ${pc.gray(`(offset ${verdict.offset}, fuzz ${verdict.fuzz})`)}`,
          );
          break;
        case 'WouldFail':
          console.log(`  ${pc.red('✖')} ${file.path}`);
          break;
      }
      this.renderDiagnostics(file.diagnostics, '    ');
    }
  }

  private renderDiagnostics(diagnostics: readonly PatchDiagnostic[], indent = '  '): void {
    for (const diagnostic of diagnostics) {
      const icon = diagnostic.severity === 'error' ? pc.red('error') : pc.cyan('info');
      console.log(`${indent}${icon} ${diagnostic.message}`);
      if (diagnostic.suggestion && diagnostic.severity === 'error') {
        console.log(`${indent}  ${pc.gray(diagnostic.suggestion)}`);
      }
    }
  }
}

/** Diagnostics that belong to no file report, such as timeouts */
function unlisted(report: { files: readonly FileReport[]; diagnostics: readonly PatchDiagnostic[] }) {
  const listed = new Set(report.files.flatMap((file) => file.diagnostics));
  return report.diagnostics.filter((d) => !listed.has(d));
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
