import { validateConfig } from '../src/config';
import { pool } from '../src/config/database';
import { jobRunnerService } from '../src/services/jobs/job-runner.service';
import { optionsFromArgs } from '../src/utils/job-args.util';
import { jobNameSchema, parseJobRequest } from '../src/validators/job-request.validator';

const USAGE = `Usage: npm run job -- <fetch|export|snapshot|digest> [options]

  --project-filter <text>   only projects whose name contains <text>
  --batch-size <n>          process <n> projects
  --batch-number <n>        which batch of --batch-size to process (from 0)
  --incremental             fetch only tasks modified since the last fetch run began
  --completed-since <date>  lower bound for completed tasks
  --months <list>           comma-separated YYYY-MM months to export
  --period <daily|monthly>  digest period (default daily)
  --month <YYYY-MM>         monthly digest month (default latest with data)
  --date <YYYY-MM-DD>       daily digest date (default yesterday)
  --top-n <n>               projects and assignees listed in a digest

Options belong to one job; passing another job's option is an error.`;

async function main() {
  const [job, ...rest] = process.argv.slice(2);
  const name = jobNameSchema.safeParse(job);
  if (!name.success) {
    console.error(USAGE);
    process.exit(1);
  }

  validateConfig([name.data]);
  const request = parseJobRequest(name.data, optionsFromArgs(name.data, rest));
  const summary = await jobRunnerService.run(request);

  console.log(JSON.stringify(summary, null, 2));
  await pool.end();
  process.exit(summary.status === 'failure' ? 1 : 0);
}

main().catch((error) => {
  console.error('❌ Job failed:', error);
  process.exit(1);
});
