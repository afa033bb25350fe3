import chalk from 'chalk';
import { loadConfig } from '../../config/loader';
import { TemplateManager } from '../../core/template-manager';
import { errorMessage } from '../../core/errors';

interface TemplateCommandOptions {
  config?: string;
}

async function createTemplateManager(options: TemplateCommandOptions): Promise<TemplateManager> {
  const config = await loadConfig(options.config);
  return new TemplateManager({ customPath: config.templates.customPath });
}

export async function templateListCommand(options: TemplateCommandOptions = {}): Promise<void> {
  try {
    const manager = await createTemplateManager(options);
    console.log(chalk.bold('\nAvailable Templates\n'));
    console.log(chalk.gray('─'.repeat(80)));
    for (const id of await manager.listTemplates()) {
      console.log(`  ${id}`);
    }
    console.log(chalk.gray('─'.repeat(80)));
  } catch (error) {
    console.error(chalk.red(`Failed to list templates: ${errorMessage(error)}`));
    process.exit(1);
  }
}

export async function templateShowCommand(templateId: string, options: TemplateCommandOptions = {}): Promise<void> {
  try {
    const manager = await createTemplateManager(options);
    const content = await manager.loadTemplate(templateId);
    console.log(chalk.bold(`\nTemplate: ${templateId}\n`));
    console.log(chalk.gray('─'.repeat(80)));
    console.log(content);
    console.log(chalk.gray('─'.repeat(80)));
    console.log(chalk.gray(`Context keys: ${TemplateManager.referencedKeys(content).join(', ') || 'none'}`));
  } catch (error) {
    console.error(chalk.red(`Failed to show template: ${errorMessage(error)}`));
    process.exit(1);
  }
}
