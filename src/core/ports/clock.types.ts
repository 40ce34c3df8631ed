export interface Clock {
  now(): Date;
  nowUnixSeconds(): number;
}
