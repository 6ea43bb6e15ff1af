// src/__tests__/Validate.test.ts
import { verifyDataProperties } from '../validate';

const base = {
  xData: [1, 2],
  yData: [3, 4],
  pieData: [[1, 2], [3, 4]],
  sizeData: 10,
};

test('consistent data passes', () => {
  expect(verifyDataProperties(base)).toBeNull();
  expect(verifyDataProperties({ ...base, sizeData: [5, 6] })).toBeNull();
});

test('x/y length mismatch is reported first', () => {
  expect(verifyDataProperties({ ...base, yData: [3], sizeData: [1] })).toEqual({
    code: 'DataLengthMismatch',
    message: 'XData and YData must be the same length.',
  });
});

test('pie row count must match the points', () => {
  expect(verifyDataProperties({ ...base, pieData: [[1, 2]] })?.message)
    .toBe('PieData must have the same number of rows as XData.');
});

test('ragged pie rows are rejected', () => {
  expect(verifyDataProperties({ ...base, pieData: [[1, 2], [3]] })?.message)
    .toBe('Every PieData row must have the same number of categories.');
});

test('size vector must match the points', () => {
  expect(verifyDataProperties({ ...base, sizeData: [1, 2, 3] })?.message)
    .toBe('SizeData must be a scalar or have the same number of rows as XData.');
});
