export interface Tag {
  id: number;
  user_id: string;
  name: string;
  created_at: string;
}

export interface Note {
  id: number;
  user_id: string;
  title: string;
  content: string;
  summary: string | null;
  tags: Tag[];
  created_at: string;
  updated_at: string;
}

export type SummaryStatus = 'generated' | 'verbatim' | 'extractive' | 'skipped' | 'failed';

export interface CreatedNote extends Note {
  summary_status: SummaryStatus;
}

export interface CreateNoteDto {
  title: string;
  content: string;
  tags?: string[];
  auto_summarize?: boolean;
}

export interface UpdateNoteDto {
  title?: string;
  content?: string;
  tags?: string[];
}

export interface NoteFilters {
  search?: string;
  tag?: string;
}

export interface NoteSummary {
  summary: string;
  model: string;
}
