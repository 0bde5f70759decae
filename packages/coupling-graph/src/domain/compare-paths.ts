// Code-point order, which matches the UTF-8 byte order of the paths git reports.
export const comparePaths = (left: string, right: string): number => {
  let index = 0;
  while (index < left.length && index < right.length) {
    const leftPoint = left.codePointAt(index) ?? 0;
    const rightPoint = right.codePointAt(index) ?? 0;
    if (leftPoint !== rightPoint) {
      return leftPoint < rightPoint ? -1 : 1;
    }

    index += leftPoint > 0xffff ? 2 : 1;
  }

  return Math.sign(left.length - right.length);
};
