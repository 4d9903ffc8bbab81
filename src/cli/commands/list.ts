import { type SecretRequirement, listRegisteredSecretKinds, sortSecretDescriptions } from '../../secrets';
import { reportError } from './output';

interface SecretRow {
  kind: string;
  requirement: SecretRequirement;
  scope: string;
  key: string;
  instructions: string;
}

export async function listCommand(options: { json?: boolean } = {}): Promise<void> {
  try {
    const rows: SecretRow[] = sortSecretDescriptions(
      listRegisteredSecretKinds().map(({ id, kind }) => ({
        kind: id,
        requirement: kind.requirement,
        ...kind.description(),
      }))
    );

    if (options.json) {
      // Descriptions only - values are never loaded here
      console.log(JSON.stringify({ secrets: rows }, null, 2));
      return;
    }

    if (rows.length === 0) {
      console.log('No secret kinds registered.');
      return;
    }

    console.log('');
    console.log('Secrets:');
    for (const row of rows) {
      console.log(`  ${row.scope}/${row.key} (${row.requirement}, ${row.kind})`);
      console.log(`    ${row.instructions}`);
    }
    console.log('');

  } catch (error) {
    reportError(error, options.json);
    process.exit(1);
  }
}
