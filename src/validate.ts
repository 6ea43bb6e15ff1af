// src/validate.ts

export interface BubblePieData {
  xData: readonly number[];
  yData: readonly number[];
  pieData: readonly (readonly number[])[];
  sizeData: number | readonly number[];
}

export interface DataMismatch {
  code: 'DataLengthMismatch';
  message: string;
}

function mismatch(message: string): DataMismatch {
  return { code: 'DataLengthMismatch', message };
}

/** First inconsistency between the per-point arrays, or null when they agree. */
export function verifyDataProperties(data: BubblePieData): DataMismatch | null {
  const count = data.xData.length;

  if (data.yData.length !== count) {
    return mismatch('XData and YData must be the same length.');
  }
  if (data.pieData.length !== count) {
    return mismatch('PieData must have the same number of rows as XData.');
  }
  const categories = data.pieData[0]?.length ?? 0;
  if (data.pieData.some(row => row.length !== categories)) {
    return mismatch('Every PieData row must have the same number of categories.');
  }
  if (typeof data.sizeData !== 'number' && data.sizeData.length !== count) {
    return mismatch('SizeData must be a scalar or have the same number of rows as XData.');
  }
  return null;
}
