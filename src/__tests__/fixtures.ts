import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import type { ShowOutput } from '../processor/ShowOutput';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'snds-show-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeTextFile(dir: string, fileName: string, content: string): string {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, content, 'utf8');
  return filePath;
}

export const writeCsv = writeTextFile;

export function writeGzCsv(dir: string, fileName: string, content: string): string {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, zlib.gzipSync(Buffer.from(content, 'utf8')));
  return filePath;
}

export interface CapturedOutput extends ShowOutput {
  stdout: string[];
  stderr: string[];
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: text => stdout.push(text),
    err: text => stderr.push(text),
  };
}

export const DATA_CSV = [
  'IP Address,Activity start,Activity end,RCPT commands,DATA commands,Message recipients,Filter result,Complaint rate,Trap message period,Trap hits,Sample HELO,JMR P1 Sender,Comments',
  '192.0.2.10,11/1/2025 1:00 AM,11/1/2025 11:00 PM,1200,1190,1185,GREEN,< 0.1%,,0,mail.example.com,bounce@example.com,',
  '192.0.2.11,11/1/2025 2:00 AM,11/1/2025 10:00 PM,40,40,40,YELLOW,0.3%,,2,mx.example.com,bounce@example.com,',
  '',
].join('\n');

export const IPSTATUS_CSV = [
  'First IP,Last IP,Blocked,Details',
  '192.0.2.1,192.0.2.255,Yes,Junked due to user complaints or other evidence of spamming',
  '198.51.100.1,198.51.100.3,No,',
  '',
].join('\n');
