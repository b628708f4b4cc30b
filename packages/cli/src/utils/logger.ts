import pc from "picocolors";

export const log = {
  error(...messages: string[]) {
    console.error(pc.red(messages.join(" ")));
  },
  success(...messages: string[]) {
    console.log(pc.green(messages.join(" ")));
  },
  step(...messages: string[]) {
    console.log(pc.cyan(`==> ${messages.join(" ")}`));
  },
  debug(...messages: string[]) {
    console.log(pc.dim(messages.join(" ")));
  },
};
