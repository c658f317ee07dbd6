export interface Alias {
  trigger: string;
  replacement: string;
}
