export default interface FileParser<T> {
  /**
   * Determines if this file can be parsed by the parser
   * @param filename path of the file
   */
  isParseable(filename: string): Promise<boolean>;

  /**
   * Parses the file
   * @param filename path of the file
   */
  parse(filename: string): Promise<T>;
}
