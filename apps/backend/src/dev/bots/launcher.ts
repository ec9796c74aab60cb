import '../../env';
import { logger } from '../../logger';
import { RandomBot } from './RandomBot';

const args = process.argv.slice(2);
const count = Number(args[0] || 2);
const baseUrl = args[1] || `http://localhost:${process.env.BACKEND_PORT ?? 54345}`;

async function main() {
  const runs: Promise<void>[] = [];
  for (let i = 0; i < count; i++) {
    const name = `Bot-${Math.floor(Math.random() * 10000)}`;
    const bot = new RandomBot(name, { attackAgainProbability: Math.random(), delayMs: 100 + Math.floor(Math.random() * 300) });
    runs.push(bot.connect(baseUrl));
    // small stagger
    await new Promise((r) => setTimeout(r, 200));
  }
  await Promise.all(runs);
  logger.info({ count }, 'all bots finished');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'bot launcher failed');
  process.exit(1);
});
