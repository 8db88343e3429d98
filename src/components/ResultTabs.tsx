import React, { useState } from 'react';
import { Box, Paper, Tab, Tabs } from '@mui/material';
import type { EmailCollection } from '../types/email';
import { emailsToCsv, emailsToJson } from '../utils/exporters';
import EmailList from './EmailList';

interface ResultTabsProps {
  emails: EmailCollection;
}

type ResultView = 'pretty' | 'json' | 'csv';

const codeBlockSx = {
  m: 0,
  p: 2,
  overflow: 'auto',
  fontFamily: 'monospace',
  fontSize: '0.8rem',
  bgcolor: 'grey.50',
  borderRadius: 1,
  maxHeight: 480,
} as const;

// Every view re-renders from the latest snapshot, so partial results show up in all three.
const ResultTabs: React.FC<ResultTabsProps> = ({ emails }) => {
  const [view, setView] = useState<ResultView>('pretty');

  return (
    <Paper elevation={0} sx={{ bgcolor: 'transparent' }}>
      <Tabs value={view} onChange={(_, value: ResultView) => setView(value)} sx={{ mb: 1 }}>
        <Tab label="Pretty View" value="pretty" />
        <Tab label="JSON" value="json" />
        <Tab label="CSV" value="csv" />
      </Tabs>
      {view === 'pretty' && <EmailList emails={emails} />}
      {view === 'json' && (
        <Box component="pre" sx={codeBlockSx} data-testid="json-preview">
          {emailsToJson(emails)}
        </Box>
      )}
      {view === 'csv' && (
        <Box component="pre" sx={codeBlockSx} data-testid="csv-preview">
          {emailsToCsv(emails)}
        </Box>
      )}
    </Paper>
  );
};

export default ResultTabs;
