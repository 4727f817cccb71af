import { authService } from '../src/services/auth/auth.service';

/**
 * Mint a bearer token for the /jobs endpoints.
 * Usage: npm run issue-token -- <subject> [days]
 */
const [subject = 'scheduler', days = '30'] = process.argv.slice(2);
const expiresInDays = parseInt(days, 10);

if (Number.isNaN(expiresInDays) || expiresInDays <= 0) {
  console.error(`❌ Invalid lifetime '${days}', expected a positive number of days`);
  process.exit(1);
}

const token = authService.signToken(subject, expiresInDays * 24 * 60 * 60);
console.log(`✓ Token for '${subject}', valid for ${expiresInDays} day(s):`);
console.log(token);
