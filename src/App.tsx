import { BrowserRouter as Router, Routes, Route, Navigate } from 'react-router-dom';
import ExpansionPlannerPage from './pages/ExpansionPlanner/ExpansionPlannerPage';

function App() {
    return (
        <Router>
            <Routes>
                <Route path="/" element={<ExpansionPlannerPage />} />
                <Route path="*" element={<Navigate to="/" replace />} />
            </Routes>
        </Router>
    );
}

export default App;
