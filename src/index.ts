import "dotenv/config";
import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { TelegramClient } from "./adapters/telegram/TelegramClient.js";
import { Dispatcher } from "./core/dispatcher.js";
import { OneMapGeocoder } from "./geocode/oneMap.js";
import { RvmDataset } from "./rvm/dataset.js";
import { CsvFileStorage } from "./rvm/storage.js";
import { ReminderScheduler } from "./reminders/scheduler.js";
import { ReminderStore } from "./reminders/store.js";

const config = loadConfig();
setLogLevel(config.LOG_LEVEL);

const dataset = new RvmDataset(
  new CsvFileStorage(config.RVM_DATA_FILE),
  new OneMapGeocoder(config.ONEMAP_BASE_URL, config.HTTP_TIMEOUT_MS)
);
dataset.load();

const reminders = new ReminderStore(config.DATA_DIR);
const telegram = new TelegramClient(config);
const dispatcher = new Dispatcher(telegram, { dataset, reminders });
const scheduler = new ReminderScheduler(reminders, (msg) => telegram.send(msg), config.REMINDER_POLL_MS);

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");
  scheduler.stop();
  try {
    await telegram.disconnect();
  } catch (err) {
    logger.warn({ err }, "Telegram disconnect failed");
  }
  try {
    dataset.persist();
    logger.info({ file: config.RVM_DATA_FILE, count: dataset.size }, "RVM table saved");
  } catch (err) {
    logger.fatal({ err, file: config.RVM_DATA_FILE }, "Saving RVM table failed");
    process.exit(1);
  }
  process.exit(0);
}

process.once("SIGINT", (sig) => void shutdown(sig));
process.once("SIGTERM", (sig) => void shutdown(sig));

const me = await telegram.getMe();
telegram.connect((evt) => dispatcher.handle(evt));
scheduler.start();

logger.info(
  {
    bot: me.username,
    rvms: dataset.size,
    reminders: reminders.listAll().length,
    reminderPollMs: config.REMINDER_POLL_MS
  },
  "Bot started"
);
