/**
 * Main App Component
 * Manages navigation between menu and run mode
 */

import React, { useState } from 'react';
import { useApp } from 'ink';
import type { SampleProgram } from '../../core/src';
import { Menu } from './Menu';
import { RunMode } from './RunMode';

interface AppProps {
  programs: SampleProgram[];
  maxSteps: number;
  showAllMemory: boolean;
  /** Program opened from the command line; skips the menu */
  initialProgram?: SampleProgram;
}

export const App: React.FC<AppProps> = ({ programs, maxSteps, showAllMemory, initialProgram }) => {
  const { exit } = useApp();
  const [selectedProgram, setSelectedProgram] = useState<SampleProgram | undefined>(initialProgram);

  const handleSelectProgram = (index: number): void => {
    setSelectedProgram(programs[index]);
  };

  const handleExit = (): void => {
    if (initialProgram) {
      exit();
    } else {
      setSelectedProgram(undefined);
    }
  };

  if (!selectedProgram) {
    return <Menu programs={programs} onSelect={handleSelectProgram} onExit={exit} />;
  }
  return (
    <RunMode
      key={selectedProgram.name}
      program={selectedProgram}
      maxSteps={maxSteps}
      showAllMemory={showAllMemory}
      onExit={handleExit}
    />
  );
};
