export interface ActivityLog {
  append(lines: string[]): Promise<void>;
}

export interface MessageFlag {
  write(text: string): Promise<void>;
}
