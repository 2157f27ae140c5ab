// Sample target for the casegen command: `npm run casegen examples/shapes.ts`

type int = number;

export function area(width: int, height: int): int {
  return width * height;
}

export function divide(a: int, b: int): number {
  if (b === 0) {
    throw new RangeError("Cannot divide by zero");
  }
  return a / b;
}

export const initials = (name: string): string =>
  name
    .split(" ")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase())
    .join("");

export function total(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0);
}

export class Rectangle {
  constructor(private w: int, private h: int) {
    if (w < 0 || h < 0) {
      throw new RangeError("Sides must not be negative");
    }
  }

  get width(): int {
    return this.w;
  }

  set width(value: int) {
    this.w = value;
  }

  area(): int {
    return this.w * this.h;
  }

  scale(factor: int): Rectangle {
    return new Rectangle(this.w * factor, this.h * factor);
  }

  static unit(): Rectangle {
    return new this(1, 1);
  }

  static sameArea(first: Rectangle, second: Rectangle): boolean {
    return first.area() === second.area();
  }

  toString(): string {
    return `Rectangle(${this.w} x ${this.h})`;
  }
}

export class Square extends Rectangle {
  constructor(side: int) {
    super(side, side);
  }

  diagonal(): number {
    return Math.SQRT2 * this.area() ** 0.5;
  }
}

export class Account {
  private entries: int[] = [];

  constructor(public owner: string, private opening: int = 0) {}

  get balance(): int {
    return this.entries.reduce((sum, entry) => sum + entry, this.opening);
  }

  deposit(amount: int): int {
    if (amount <= 0) {
      throw new RangeError("Deposit must be positive");
    }
    this.entries.push(amount);
    return this.balance;
  }

  withdraw(amount: int): int {
    if (amount > this.balance) {
      throw new Error("Insufficient funds");
    }
    this.entries.push(-amount);
    return this.balance;
  }
}
