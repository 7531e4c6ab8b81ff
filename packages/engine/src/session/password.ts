import readline from "node:readline/promises";

export type PasswordPrompt = (username: string) => Promise<string>;

export const promptPassword: PasswordPrompt = async (username) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(`Enter host password for user '${username}': `);
  } finally {
    rl.close();
  }
};
