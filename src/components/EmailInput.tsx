import React, { useState } from 'react';
import { Box, Button, CircularProgress, TextField } from '@mui/material';
import { Send as SendIcon } from '@mui/icons-material';
import { logger } from '../utils/logger';

interface EmailInputProps {
  onSubmit: (text: string) => void;
  isStreaming: boolean;
}

const EmailInput: React.FC<EmailInputProps> = ({ onSubmit, isStreaming }) => {
  const [inputValue, setInputValue] = useState('');

  // Submitting again while a parse is running is allowed: the newer request replaces it.
  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    if (!inputValue.trim()) return;
    logger.info(`User submitted ${inputValue.length} characters for parsing`);
    onSubmit(inputValue);
  };

  return (
    <Box component="form" onSubmit={handleSubmit} sx={{ mb: 2 }}>
      <TextField
        label="Paste your text here:"
        placeholder="Paste your email text from Google Docs here..."
        value={inputValue}
        onChange={(e) => setInputValue(e.target.value)}
        multiline
        minRows={10}
        maxRows={20}
        fullWidth
        sx={{ mb: 2, bgcolor: 'background.paper' }}
      />
      <Button
        type="submit"
        variant="contained"
        disabled={!inputValue.trim()}
        startIcon={isStreaming ? <CircularProgress size={18} color="inherit" /> : <SendIcon />}
      >
        Parse Emails
      </Button>
    </Box>
  );
};

export default EmailInput;
