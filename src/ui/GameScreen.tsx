/**
 * GameScreen.tsx - Terminal front end for a game against the engine
 */

import React, { useState, useEffect, useCallback } from 'react';
import { Box, Static, Text, render, type Instance } from 'ink';
import TextInput from 'ink-text-input';
import type { GameScreenState, GameSession } from './GameSession.js';

interface GameScreenProps {
  session: GameSession;
}

export const GameScreen: React.FC<GameScreenProps> = ({ session }) => {
  const [state, setState] = useState<GameScreenState>(session.getState());
  const [input, setInput] = useState('');

  useEffect(() => session.subscribe(setState), [session]);

  const handleSubmit = useCallback((value: string) => {
    if (session.submit(value.trim())) {
      setInput('');
    }
  }, [session]);

  return (
    <Box flexDirection="column">
      <Static items={[...state.lines]}>
        {(line, index) => <Text key={index}>{line}</Text>}
      </Static>

      {state.thinking && <Text color="yellow">Calculating...</Text>}

      {state.prompt !== null && !state.thinking && (
        <Box>
          <Text color="yellow">{state.prompt}: </Text>
          <TextInput
            value={input}
            onChange={setInput}
            onSubmit={handleSubmit}
          />
        </Box>
      )}
    </Box>
  );
};

export function renderGameScreen(session: GameSession): Instance {
  return render(<GameScreen session={session} />);
}
