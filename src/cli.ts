import { readFile, writeFile } from 'node:fs/promises';
import process from 'node:process';
import { parseCliArgs, USAGE } from '@/lib/cli-args';
import { env } from '@/lib/config';
import { errorMessage, GenerationError } from '@/lib/errors';
import { TemplateRegistry } from '@/lib/template-registry';
import type { ValidationReport } from '@/lib/validation';
import { createGenerator } from '@/pipeline/generator';

function printReport(report: ValidationReport) {
  console.info(`valid: ${report.valid}`);
  console.info(`image quality: ${report.imageQuality}`);
  for (const issue of report.issues) console.info(`- ${issue}`);
}

async function main(argv: readonly string[]): Promise<number> {
  const cli = parseCliArgs(argv);
  switch (cli.command) {
    case 'help':
      if (cli.error) console.error(cli.error);
      console.info(USAGE);
      return cli.error ? 1 : 0;
    case 'list-templates': {
      const registry = await TemplateRegistry.load(cli.directory ?? env.TEMPLATE_DIR);
      for (const t of registry.list()) {
        console.info(`${t.id}\t${t.displayName}\t${t.description}`);
      }
      return 0;
    }
    case 'generate': {
      const registry = await TemplateRegistry.load(cli.directory ?? env.TEMPLATE_DIR);
      const generator = createGenerator({ registry });
      const result = await generator.generate(await readFile(cli.input), cli.templateId, cli.params);
      printReport(result.report);
      await writeFile(cli.output, result.image);
      console.info(`wrote ${cli.output} (${result.raster.width}x${result.raster.height})`);
      return 0;
    }
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const code = err instanceof GenerationError ? ` [${err.code}]` : '';
    console.error(`[cli] ${errorMessage(err)}${code}`);
    process.exitCode = 1;
  },
);
