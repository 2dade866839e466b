import "dotenv/config";
import { loadConfig } from "../config.js";
import { TelegramClient } from "../adapters/telegram/TelegramClient.js";
import { RvmDataset } from "../rvm/dataset.js";
import { CsvFileStorage } from "../rvm/storage.js";
import { ReminderStore } from "../reminders/store.js";
import { errorMessage } from "../utils/async.js";

type CheckResult = { ok: boolean; detail: string };

function checkDataset(file: string): CheckResult {
  try {
    const dataset = new RvmDataset(new CsvFileStorage(file));
    const count = dataset.load();
    const statuses = dataset.all().reduce<Record<string, number>>((acc, r) => {
      acc[r.status] = (acc[r.status] ?? 0) + 1;
      return acc;
    }, {});
    return { ok: count > 0, detail: `${count} RVMs ${JSON.stringify(statuses)}` };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

function checkReminders(dataDir: string): CheckResult {
  try {
    const store = new ReminderStore(dataDir);
    return { ok: true, detail: `${store.listAll().length} reminders in ${store.filePath}` };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

async function checkTelegram(client: TelegramClient): Promise<CheckResult> {
  try {
    const me = await client.getMe();
    return { ok: true, detail: `@${me.username ?? me.id}` };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

const cfg = loadConfig();

console.log("Configuration:");
console.log("  RVM_DATA_FILE    =", cfg.RVM_DATA_FILE);
console.log("  DATA_DIR         =", cfg.DATA_DIR);
console.log("  TELEGRAM_API_URL =", cfg.TELEGRAM_API_URL);
console.log("  ONEMAP_BASE_URL  =", cfg.ONEMAP_BASE_URL);
console.log("");

const data = checkDataset(cfg.RVM_DATA_FILE);
const rems = checkReminders(cfg.DATA_DIR);
const tg = await checkTelegram(new TelegramClient(cfg));

console.log("Checks:");
console.log("  RVM table :", data.ok ? "OK" : "FAIL", "-", data.detail);
console.log("  Reminders :", rems.ok ? "OK" : "FAIL", "-", rems.detail);
console.log("  Telegram  :", tg.ok ? "OK" : "FAIL", "-", tg.detail);
console.log("");

if (!tg.ok && tg.detail.includes("401")) {
  console.log("Telegram rejected the token. Check BOT_TOKEN in .env.");
  console.log("");
}

process.exit(data.ok && rems.ok && tg.ok ? 0 : 1);
