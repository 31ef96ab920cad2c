export type Category = {
  id: number;
  label: string;
};

export type Question = {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number; // 1..5
};

/** Fields accepted by create; anything may be missing on the way in. */
export type NewQuestionInput = {
  question?: string | null;
  answer?: string | null;
  category?: number | null;
  difficulty?: number | null;
};

export type InsertQuestion = Omit<Question, "id">;

/** Display record handed back to callers */
export type FormattedQuestion = {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
};

export type PageResult = {
  questions: FormattedQuestion[];
  totalQuestions: number;
  categories: string[];
  currentCategory: null;
};

export type CreateResult = {
  created: number;
  questionCreated: string;
  questions: FormattedQuestion[];
};

export type SearchResult = {
  questions: FormattedQuestion[];
  totalQuestions: number;
  currentCategory: null;
};

export type DeleteResult = {
  deleted: number;
  questions: FormattedQuestion[];
};

export type CategoryResult = {
  questions: FormattedQuestion[];
  totalQuestions: number;
  currentCategory: string;
};

/** Returns a float in [0, 1) */
export type RandomSource = () => number;
