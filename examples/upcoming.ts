import { CFPTime, isHttpError } from '../src/index.js';

const cfptime = new CFPTime({ timeout: 10_000, retry: 1 });
const [err, upcoming] = await cfptime.getUpcoming();

if (err) {
  console.error(isHttpError(err) ? `API answered ${err.status}: ${err.body}` : err.message);
  process.exit(1);
}

console.log(`${upcoming.length} upcoming conferences`);
console.log(JSON.stringify(upcoming, null, 2));
