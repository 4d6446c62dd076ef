// stdout belongs to the stdio transport, so every line goes to stderr
function line(message: string): string {
  return `${new Date().toISOString()} ${message}`;
}

export const logger = {
  info(message: string): void {
    console.error(line(message));
  },

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(line(message));
    } else {
      console.error(line(message), error);
    }
  }
};
