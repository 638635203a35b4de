export type { Clock } from "./clock.js";
export type { TimerService, DelayFn, RandomFn } from "./timer.js";
export type { PromptService } from "./prompt.js";
export type { SignalHandler } from "./signal-handler.js";
export type { HttpResponse, HttpRequestInit, HttpSession, HttpSessionFactory } from "./http.js";
