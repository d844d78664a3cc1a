export type Id = number;
export type Name = string;
export type ErrorMessage = string;
