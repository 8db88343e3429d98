import React, { useEffect, useMemo, useState } from 'react';
import {
  Box,
  Chip,
  IconButton,
  List,
  ListItem,
  ToggleButton,
  ToggleButtonGroup,
  Toolbar,
  Tooltip,
  Typography,
} from '@mui/material';
import CloseIcon from '@mui/icons-material/Close';
import DeleteSweepIcon from '@mui/icons-material/DeleteSweep';
import DownloadIcon from '@mui/icons-material/Download';
import PauseIcon from '@mui/icons-material/Pause';
import PlayArrowIcon from '@mui/icons-material/PlayArrow';
import { logger, type LogEntry, type LogLevel } from '../utils/logger';
import { downloadText } from '../utils/exporters';

interface LogViewerProps {
  onClose?: () => void;
}

const severity: Record<LogLevel, number> = { debug: 0, info: 1, warning: 2, error: 3 };

const levelColor: Record<LogLevel, string> = {
  debug: 'text.disabled',
  info: 'info.main',
  warning: 'warning.main',
  error: 'error.main',
};

const formatEntry = (entry: LogEntry) => `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.logger}: ${entry.message}`;

// Newest entries are listed first.
const LogViewer: React.FC<LogViewerProps> = ({ onClose }) => {
  const [entries, setEntries] = useState<readonly LogEntry[]>(() => logger.getEntries());
  const [isPaused, setIsPaused] = useState(false);
  const [minLevel, setMinLevel] = useState<LogLevel>('debug');

  useEffect(() => {
    if (isPaused) return;
    setEntries(logger.getEntries());
    return logger.subscribe(() => setEntries(logger.getEntries()));
  }, [isPaused]);

  const visible = useMemo(
    () => entries.filter((entry) => severity[entry.level] >= severity[minLevel]).reverse(),
    [entries, minLevel],
  );

  const handleClear = () => {
    logger.clear();
    setEntries([]);
  };

  const handleDownload = () => {
    downloadText(entries.map(formatEntry).join('\n'), `logs-${new Date().toISOString()}.txt`, 'text/plain;charset=utf-8');
  };

  return (
    <Box sx={{ height: '100%', display: 'flex', flexDirection: 'column', bgcolor: 'background.paper' }}>
      <Toolbar variant="dense" disableGutters sx={{ px: 1.5, gap: 1, borderBottom: 1, borderColor: 'divider' }}>
        <Typography variant="subtitle1" sx={{ flexGrow: 1 }}>
          App Logs
        </Typography>
        <Chip label={`${visible.length} entries`} size="small" />
        <Tooltip title={isPaused ? 'Resume' : 'Pause'}>
          <IconButton size="small" aria-label={isPaused ? 'resume logs' : 'pause logs'} onClick={() => setIsPaused(!isPaused)}>
            {isPaused ? <PlayArrowIcon /> : <PauseIcon />}
          </IconButton>
        </Tooltip>
        <Tooltip title="Download Logs">
          <IconButton size="small" aria-label="download logs" onClick={handleDownload}>
            <DownloadIcon />
          </IconButton>
        </Tooltip>
        <Tooltip title="Clear Logs">
          <IconButton size="small" aria-label="clear logs" onClick={handleClear}>
            <DeleteSweepIcon />
          </IconButton>
        </Tooltip>
        {onClose && (
          <IconButton size="small" aria-label="close logs" onClick={onClose}>
            <CloseIcon />
          </IconButton>
        )}
      </Toolbar>

      <ToggleButtonGroup
        value={minLevel}
        exclusive
        size="small"
        onChange={(_, level: LogLevel | null) => level && setMinLevel(level)}
        sx={{ p: 1 }}
      >
        <ToggleButton value="debug">All</ToggleButton>
        <ToggleButton value="info">Info+</ToggleButton>
        <ToggleButton value="warning">Warnings+</ToggleButton>
        <ToggleButton value="error">Errors</ToggleButton>
      </ToggleButtonGroup>

      {visible.length === 0 ? (
        <Typography variant="body2" color="text.secondary" sx={{ textAlign: 'center', mt: 4 }}>
          No logs to display
        </Typography>
      ) : (
        <List dense sx={{ flexGrow: 1, overflow: 'auto', fontFamily: 'monospace', fontSize: '0.8rem' }}>
          {visible.map((entry, index) => (
            <ListItem key={`${entry.timestamp}-${index}`} divider sx={{ display: 'block', py: 0.5 }}>
              <Typography component="span" variant="caption" color="text.secondary" sx={{ mr: 1 }}>
                {new Date(entry.timestamp).toLocaleTimeString()}
              </Typography>
              <Typography component="span" variant="caption" sx={{ mr: 1, fontWeight: 'bold', color: levelColor[entry.level] }}>
                {entry.level.toUpperCase()}
              </Typography>
              <Typography component="div" variant="body2" sx={{ wordBreak: 'break-word', fontFamily: 'inherit' }}>
                {entry.message}
              </Typography>
            </ListItem>
          ))}
        </List>
      )}
    </Box>
  );
};

export default LogViewer;
