export type { ICheckInRepository } from './ICheckInRepository';
