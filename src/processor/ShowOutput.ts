export interface ShowOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: ShowOutput = {
  out: text => console.log(text),
  err: text => console.error(text),
};
