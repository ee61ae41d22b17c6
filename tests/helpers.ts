/**
 * Run a function that is expected to throw an instance of errorClass and
 * return the error for further assertions.
 */
export function expectThrown<T extends Error>(fn: () => unknown, errorClass: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(errorClass);
    if (error instanceof errorClass) {
      return error;
    }
  }
  throw new Error(`Expected ${errorClass.name} to be thrown`);
}
