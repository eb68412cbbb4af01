import chalk from "chalk";

export const theme = {
  accent: chalk.cyan,
  heading: chalk.bold,
  success: chalk.green,
  error: chalk.red,
  muted: chalk.gray,
};
