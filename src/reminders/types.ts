export type ReminderFrequency = "monthly";

export type TimeOfDay = { hour: number; minute: number };

export type ReminderRecord = TimeOfDay & {
  userId: string;
  chatId: string;
  frequency: ReminderFrequency;
  dayOfMonth: number;
  createdAtMs: number;
  lastFiredAtMs: number | null;
  attempts: number;
  lastError?: string;
};
