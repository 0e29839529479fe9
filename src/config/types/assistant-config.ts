export interface AssistantConfig {
  /** Absolute path of the JSON file the book is loaded from and saved to */
  dataFile: string
  /** Length of the upcoming-birthdays window, reference day included */
  birthdayWindowDays: number
}
