import { CFPTime } from '../src/index.js';

const cfptime = new CFPTime({ debug: process.env.DEBUG === '1' });
const [err, data] = await cfptime.getConferences();

if (err) {
  console.error(`${err.kind}: ${err.message}`);
  process.exit(1);
}

console.log(JSON.stringify(data, null, 2));
