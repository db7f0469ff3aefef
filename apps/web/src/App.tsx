import { Routes, Route } from 'react-router-dom';
import { AppShell } from './components/AppShell.js';
import { HomePage } from './pages/HomePage.js';
import { TalkPage } from './pages/TalkPage.js';
import { MoodPage } from './pages/MoodPage.js';
import { JournalPage } from './pages/JournalPage.js';
import { MorePage } from './pages/MorePage.js';
import { NotFoundPage } from './pages/NotFoundPage.js';

export function App() {
  return (
    <Routes>
      {/* AppShell provides sidebar, topbar and the safety sheet for every page */}
      <Route element={<AppShell />}>
        <Route index element={<HomePage />} />
        <Route path="/talk" element={<TalkPage />} />
        <Route path="/mood" element={<MoodPage />} />
        <Route path="/journal" element={<JournalPage />} />
        <Route path="/more" element={<MorePage />} />
        <Route path="*" element={<NotFoundPage />} />
      </Route>
    </Routes>
  );
}
