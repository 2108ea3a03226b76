/**
 * runeq - Basic Usage Example
 *
 * Lists the patients visible to the configured credentials, then prints the
 * first rows of one of their streams. Credentials are read from
 * ~/.rune/config.
 */

import {
  APIError,
  NotFoundError,
  getPatientStreamMetadata,
  getStreamData,
  initialize,
  parseCsvPages,
} from '../src/index';

export async function runBasicUsageExample(): Promise<void> {
  console.log('1. Initializing from ~/.rune/config...');
  const session = initialize();

  console.log('\n2. Patients:');
  const patients = await session.patients.toArray();
  for (const patient of patients) {
    console.log(`   ${patient.id} (${patient.codeName ?? 'no code name'})`);
  }

  const [first] = patients;
  if (first === undefined) {
    console.log('   No patients available.');
    return;
  }

  console.log(`\n3. Devices of ${first.id}:`);
  for await (const device of first.devices) {
    console.log(`   ${device.id}: ${device.alias ?? 'unnamed'}`);
  }

  console.log(`\n4. Neural streams of ${first.id}:`);
  const streams = await getPatientStreamMetadata(first.id, { category: 'neural' });
  const [stream] = [...streams];
  if (stream === undefined) {
    console.log('   No neural streams.');
    return;
  }

  let count = 0;
  for await (const row of parseCsvPages(getStreamData(stream.id, { limit: 5 }))) {
    console.log(`   ${JSON.stringify(row)}`);
    count += 1;
    if (count >= 5) {
      break;
    }
  }
}

if (require.main === module) {
  runBasicUsageExample().catch((error: unknown) => {
    if (error instanceof NotFoundError) {
      console.error(`Not found: ${error.message}`);
    } else if (error instanceof APIError) {
      console.error(`API error ${error.statusCode}: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  });
}
