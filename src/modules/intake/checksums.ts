const onlyDigits = (value: string): number[] =>
  value
    .replace(/\D/g, "")
    .split("")
    .map((digit) => Number.parseInt(digit, 10));

const weightedSum = (digits: number[], weights: number[]): number =>
  weights.reduce((sum, weight, index) => sum + (digits[index] ?? 0) * weight, 0);

const isRepeatedDigit = (digits: number[]): boolean => digits.every((digit) => digit === digits[0]);

/** CPF check digits (mod 11, weights 10..2 then 11..2). */
export function isValidCpf(value: string): boolean {
  const digits = onlyDigits(value);
  if (digits.length !== 11 || isRepeatedDigit(digits)) {
    return false;
  }

  const first = ((weightedSum(digits, [10, 9, 8, 7, 6, 5, 4, 3, 2]) * 10) % 11) % 10;
  if (first !== digits[9]) {
    return false;
  }

  const second = ((weightedSum(digits, [11, 10, 9, 8, 7, 6, 5, 4, 3, 2]) * 10) % 11) % 10;
  return second === digits[10];
}

const cnpjDigit = (digits: number[], weights: number[]): number => {
  const remainder = weightedSum(digits, weights) % 11;
  return remainder < 2 ? 0 : 11 - remainder;
};

/** CNPJ check digits (mod 11, weights 5,4,3,2,9..2 then 6,5,4,3,2,9..2). */
export function isValidCnpj(value: string): boolean {
  const digits = onlyDigits(value);
  if (digits.length !== 14 || isRepeatedDigit(digits)) {
    return false;
  }

  if (cnpjDigit(digits, [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]) !== digits[12]) {
    return false;
  }
  return cnpjDigit(digits, [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]) === digits[13];
}
