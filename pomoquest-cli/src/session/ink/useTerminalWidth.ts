/**
 * Hook that returns the terminal width and re-renders on resize.
 */

import { useState, useEffect } from 'react';

const FALLBACK_COLUMNS = 80;

export function useTerminalWidth(): number {
  const [columns, setColumns] = useState(process.stdout.columns || FALLBACK_COLUMNS);

  useEffect(() => {
    const onResize = () => setColumns(process.stdout.columns || FALLBACK_COLUMNS);
    process.stdout.on('resize', onResize);
    return () => {
      process.stdout.off('resize', onResize);
    };
  }, []);

  return columns;
}
