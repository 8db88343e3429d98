import React, { useState } from 'react';
import { ThemeProvider, CssBaseline, Container, AppBar, Toolbar, Typography, Box, IconButton, Tooltip } from '@mui/material';
import { createTheme } from '@mui/material/styles';
import TerminalIcon from '@mui/icons-material/Terminal';
import EmailInput from './components/EmailInput';
import ExportToolbar from './components/ExportToolbar';
import ExtractionStatus from './components/ExtractionStatus';
import HowToUse from './components/HowToUse';
import LogViewer from './components/LogViewer';
import RawOutputViewer from './components/RawOutputViewer';
import ResultTabs from './components/ResultTabs';
import { useEmailExtraction } from './hooks/useEmailExtraction';
import type { StructuredModelFactory } from './services/structuredModel';
import type { AppConfig } from './utils/config';
import { logger } from './utils/logger';

const theme = createTheme({
  palette: {
    mode: 'light',
    primary: {
      main: '#1976d2',
    },
  },
});

interface AppProps {
  config: AppConfig;
  /** Swaps the model provider; tests pass an in-process fake. */
  createModel?: StructuredModelFactory;
}

const App: React.FC<AppProps> = ({ config, createModel }) => {
  const [isLogsVisible, setIsLogsVisible] = useState(false);
  const { state, submit } = useEmailExtraction({ ...config, createModel });

  // Log when app loads
  React.useEffect(() => {
    logger.info(`Email Parser started (model ${config.modelId})`);
  }, [config.modelId]);

  const handleSubmit = (text: string) => {
    void submit(text);
  };

  return (
    <ThemeProvider theme={theme}>
      <CssBaseline />
      <AppBar position="static">
        <Toolbar>
          <Typography variant="h6" component="div" sx={{ flexGrow: 1 }}>
            Email Parser
          </Typography>
          <Tooltip title={isLogsVisible ? 'Hide Logs' : 'Show Logs'}>
            <IconButton color="inherit" aria-label="toggle logs" onClick={() => setIsLogsVisible(!isLogsVisible)}>
              <TerminalIcon />
            </IconButton>
          </Tooltip>
        </Toolbar>
      </AppBar>
      <Container
        maxWidth={false}
        disableGutters
        sx={{
          height: 'calc(100vh - 64px)', // Subtract AppBar height
          bgcolor: 'grey.100',
          display: 'flex',
          overflow: 'hidden',
        }}
      >
        <Box sx={{ flexGrow: 1, overflow: 'auto', p: 2 }}>
          <HowToUse />
          <EmailInput onSubmit={handleSubmit} isStreaming={state.status === 'streaming'} />
          <ExtractionStatus state={state} />
          {state.status !== 'idle' && (
            <>
              <ExportToolbar emails={state.emails} enabled={state.status === 'done'} />
              <ResultTabs emails={state.emails} />
              <RawOutputViewer rawText={state.rawText} />
            </>
          )}
        </Box>

        {isLogsVisible && (
          <Box
            sx={{
              width: '40%',
              height: '100%',
              borderLeft: 1,
              borderColor: 'divider',
              display: { xs: 'none', md: 'flex' },
              flexDirection: 'column',
            }}
          >
            <LogViewer onClose={() => setIsLogsVisible(false)} />
          </Box>
        )}
      </Container>
    </ThemeProvider>
  );
};

export default App;
