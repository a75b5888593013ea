/**
 * A flat directory of definition or plugin files, local or remote.
 * File names passed in and returned are base names relative to `location`.
 */
export interface DefinitionStorage {
  readonly location: string;
  isDirectory(): Promise<boolean>;
  listFiles(): Promise<string[]>;
  readText(fileName: string): Promise<string>;
  pathOf(fileName: string): string;
}
