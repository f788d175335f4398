import { BrowserRouter, Navigate, Route, Routes } from 'react-router-dom'
import SurveyDashboard from './pages/SurveyDashboard'

export default function App() {
  return (
    <BrowserRouter>
      <Routes>
        <Route path="/" element={<SurveyDashboard />} />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </BrowserRouter>
  )
}
