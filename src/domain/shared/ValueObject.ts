/**
 * Base class for immutable value types.
 * Two value objects are equal when their serialized properties are equal.
 */
export abstract class ValueObject<T extends object> {
  protected readonly props: Readonly<T>;

  protected constructor(props: T) {
    this.props = Object.freeze({ ...props });
  }

  /**
   * Structural equality.
   */
  public equals(other: ValueObject<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return JSON.stringify(this.props) === JSON.stringify(other.props);
  }

  /**
   * Returns a shallow copy of the properties.
   */
  public toValue(): T {
    return { ...this.props };
  }
}
