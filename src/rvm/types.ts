import type { Coordinates } from "../types.js";

export const RVM_STATUSES = ["Working", "NotWorking", "Unknown"] as const;

export type RvmStatus = (typeof RVM_STATUSES)[number];

export type RvmRecord = Coordinates & {
  id: string;
  name: string;
  address: string;
  status: RvmStatus;
  updatedAt: string | null;
  description: string;
  hours: string;
  nearby: string;
};

export type RankedRvm = { record: RvmRecord; distanceMeters: number };
