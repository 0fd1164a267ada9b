import type { Context } from "telegraf";

export type MyContext = Context & {
  state: Context["state"] & {
    isAdmin?: boolean;
  };
};
