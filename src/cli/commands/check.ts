import {
  MissingSecretValues,
  type SecretDescription,
  checkSecretKinds,
  formatSecretDescription,
  listSecretKinds,
  sortSecretDescriptions,
} from '../../secrets';
import { loadRawSecrets } from '../config-yaml';
import { reportError } from './output';

export async function checkCommand(options: { file?: string; json?: boolean } = {}): Promise<void> {
  let missingRequired: SecretDescription[];
  let missingOptional: SecretDescription[];

  try {
    const raw = loadRawSecrets(options.file);
    const report = checkSecretKinds(listSecretKinds(), raw);
    missingRequired = sortSecretDescriptions(report.missingRequired);
    missingOptional = sortSecretDescriptions(report.missingOptional);
  } catch (error) {
    reportError(error, options.json);
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify({
      ok: missingRequired.length === 0,
      missingRequired,
      missingOptional,
    }, null, 2));
  } else {
    if (missingOptional.length > 0) {
      console.log('Optional secrets not set:');
      for (const description of missingOptional) {
        console.log(`- ${formatSecretDescription(description)}`);
      }
      console.log('');
    }

    if (missingRequired.length > 0) {
      console.error(new MissingSecretValues(missingRequired).message);
    } else {
      console.log('✅ All required secrets are set.');
    }
  }

  if (missingRequired.length > 0) {
    process.exit(1);
  }
}
