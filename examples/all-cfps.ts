import { CFPTime } from '../src/index.js';

const cfptime = new CFPTime({ debug: process.env.DEBUG === '1' });
const [err, cfps] = await cfptime.getCfps();

if (err) {
  console.error(`${err.kind}: ${err.message}`);
  process.exit(1);
}

for (const cfp of cfps) {
  console.log(`${cfp.cfp_deadline}  ${cfp.name} (${cfp.city}, ${cfp.country})`);
}
