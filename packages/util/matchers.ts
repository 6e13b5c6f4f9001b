expect.extend({
  toBeInRange(received: number, min: number, max: number) {
    const pass = received >= min && received <= max;

    return {
      pass,
      message: () =>
        `expected ${this.utils.printReceived(received)} ${pass ? 'not ' : ''}to be in range ` +
        `${this.utils.printExpected(min)} - ${this.utils.printExpected(max)}`,
    };
  },
});
