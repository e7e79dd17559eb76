export { type Interval, interval, size, within, contains, isIntegerInterval, limit } from './interval';
export { type boxND, BoxND } from './boxND';
