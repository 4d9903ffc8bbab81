import { getAllSecrets } from '../../secrets';
import { initSecretsFile } from '../config-yaml';
import { reportError } from './output';

export async function initCommand(options: { file?: string } = {}): Promise<void> {
  try {
    const file = initSecretsFile(getAllSecrets(), options.file);

    console.log('✅ Secrets file created!');
    console.log();
    console.log(`Secrets file: ${file}`);
    console.log();
    console.log('Next steps:');
    console.log(`  1. Edit ${file}`);
    console.log('     Uncomment the secrets your plugins need and fill in the values');
    console.log('  2. Verify:  plugin-secrets check');
    console.log();

  } catch (error) {
    reportError(error);
    process.exit(1);
  }
}
